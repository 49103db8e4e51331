/**
 * GC Policy Routes
 *
 *   GET    /projects/:project/instances/:instance/tables/:table/gc-policies
 *   GET    /projects/:project/instances/:instance/tables/:table/families/:family/gc-policy
 *   PUT    /projects/:project/instances/:instance/tables/:table/families/:family/gc-policy
 *          body: { "gc_rules": {...}, "deletion_mode": "default" | "abandon" }
 *   DELETE /projects/:project/instances/:instance/tables/:table/families/:family/gc-policy?deletion_mode=abandon
 *          deletion_mode defaults to the mode recorded by the last PUT
 *   POST   /gc-rules/validate
 *          body: { "gc_rules": {...} }
 *
 * PUT records the rules and deletion mode in gc_policy.column_family_policies.
 *
 * Every store call is bounded by the configured timeout and cancelled when
 * the client disconnects.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';
import { compilePolicy } from '../rules/gc-policy.compiler';
import { decompilePolicy } from '../rules/gc-policy.decompiler';
import { UnrepresentablePolicyError, ValidationError } from '../rules/gc-rule.errors';
import { parseRule } from '../rules/gc-rule.parser';
import type { ColumnFamilyRef, DeletionMode, JsonObject, JsonValue } from '../rules/gc-rule.types';
import { isDeletionMode, isJsonObject } from '../rules/gc-rule.types';
import type { ColumnFamilyPolicyRepository } from '../repositories/column-family-policy.repository';
import type { GcPolicyManager } from '../services/gc-policy-manager';
import { StoreError, type StoreCallOptions, type StoreErrorCode } from '../stores/gc-policy-store.interface';
import { formatTableRef } from '../stores/table-ref';

const TABLE_PATH = '/projects/:project/instances/:instance/tables/:table';
const FAMILY_PATH = `${TABLE_PATH}/families/:family/gc-policy`;

const STORE_ERROR_STATUS: Partial<Record<StoreErrorCode, number>> = {
  INVALID_ARGUMENT: 400,
  NOT_FOUND: 404,
  PERMISSION_DENIED: 403,
  FAILED_PRECONDITION: 409,
  DEADLINE_EXCEEDED: 504,
};

class RequestError extends Error {
  constructor(
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'RequestError';
  }
}

type AsyncHandler = (req: Request, res: Response, options: StoreCallOptions) => Promise<void>;

export function createGcPolicyRoutes(
  manager: GcPolicyManager,
  policyRepo: ColumnFamilyPolicyRepository,
  storeTimeoutMs: number
): Router {
  const router = Router();

  const handle =
    (handler: AsyncHandler) =>
    (req: Request, res: Response, next: NextFunction): void => {
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) {
          controller.abort();
        }
      });

      handler(req, res, { signal: controller.signal, timeoutMs: storeTimeoutMs }).catch(next);
    };

  router.get(
    `${TABLE_PATH}/gc-policies`,
    handle(async (req, res, options) => {
      const tableRef = tableRefFrom(req);
      const policies = await manager.list(tableRef, options);

      res.json({
        table_ref: tableRef,
        gc_policies: policies.map(({ columnFamilyId, gcRules }) => ({
          column_family_id: columnFamilyId,
          gc_rules: gcRules,
        })),
      });
    })
  );

  router.get(
    FAMILY_PATH,
    handle(async (req, res, options) => {
      const target = targetFrom(req);
      const gcRules = await manager.read(target, options);

      if (!gcRules) {
        res.status(404).json({
          error: `Column family ${target.columnFamilyId} has no GC policy`,
          code: 'NOT_FOUND',
        });
        return;
      }

      res.json(toResponse(target, gcRules));
    })
  );

  router.put(
    FAMILY_PATH,
    handle(async (req, res, options) => {
      const target = targetFrom(req);
      const body = bodyFrom(req);
      const deletionMode = deletionModeFrom(body.deletion_mode);

      const applied = await manager.apply(target, body.gc_rules, deletionMode, options);
      await policyRepo.upsertApplied(
        {
          table_ref: target.tableRef,
          column_family_id: target.columnFamilyId,
          gc_rules: body.gc_rules ?? null,
          deletion_mode: deletionMode,
        },
        new Date()
      );

      res.json({ ...toResponse(target, decompilePolicy(applied)), deletion_mode: deletionMode });
    })
  );

  router.delete(
    FAMILY_PATH,
    handle(async (req, res, options) => {
      const target = targetFrom(req);
      const requested =
        typeof req.query.deletion_mode === 'string' ? deletionModeFrom(req.query.deletion_mode) : undefined;
      const record = await policyRepo.findByFamily(target.tableRef, target.columnFamilyId);

      await manager.release(target, requested ?? record?.deletion_mode ?? 'default', options);
      if (record) {
        await policyRepo.markReleased(record.id, new Date());
      }

      res.status(204).end();
    })
  );

  router.post(
    '/gc-rules/validate',
    handle(async (req, res) => {
      const { gc_rules: gcRules } = bodyFrom(req);

      try {
        const rule = gcRules === undefined || gcRules === null ? undefined : parseRule(gcRules);
        res.json({ valid: true, gc_rules: decompilePolicy(compilePolicy(rule)) ?? null });
      } catch (error: unknown) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        res.json({ valid: false, error: validationBody(error) });
      }
    })
  );

  router.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    sendError(req, res, error);
  });

  return router;
}

function tableRefFrom(req: Request): string {
  return formatTableRef({
    project: req.params.project,
    instance: req.params.instance,
    table: req.params.table,
  });
}

function targetFrom(req: Request): ColumnFamilyRef {
  return { tableRef: tableRefFrom(req), columnFamilyId: req.params.family };
}

function bodyFrom(req: Request): JsonObject {
  const body: JsonValue | undefined = req.body;
  if (body === undefined) {
    return {};
  }
  if (!isJsonObject(body)) {
    throw new RequestError('INVALID_BODY', 'Request body must be a JSON object');
  }
  return body;
}

function deletionModeFrom(value: JsonValue | undefined): DeletionMode {
  if (value === undefined || value === null) {
    return 'default';
  }
  const mode = typeof value === 'string' ? value.toLowerCase() : value;
  if (!isDeletionMode(mode)) {
    throw new RequestError(
      'INVALID_DELETION_MODE',
      `deletion_mode must be either \`default\` or \`abandon\` (got ${JSON.stringify(value)})`
    );
  }
  return mode;
}

function toResponse(target: ColumnFamilyRef, gcRules: JsonObject | undefined) {
  return {
    table_ref: target.tableRef,
    column_family_id: target.columnFamilyId,
    gc_rules: gcRules ?? null,
  };
}

function validationBody(error: ValidationError) {
  return { error: error.message, code: error.code, path: error.path };
}

function sendError(req: Request, res: Response, error: unknown): void {
  if (error instanceof ValidationError) {
    res.status(400).json(validationBody(error));
    return;
  }
  if (error instanceof RequestError) {
    res.status(400).json({ error: error.message, code: error.code });
    return;
  }
  if (error instanceof StoreError) {
    const status = STORE_ERROR_STATUS[error.code] ?? 502;
    logger.warn('GcPolicyRoutes: Store call failed', {
      method: req.method,
      path: req.path,
      code: error.code,
      error: error.message,
    });
    res.status(status).json({ error: error.message, code: error.code });
    return;
  }
  if (error instanceof UnrepresentablePolicyError) {
    res.status(502).json({ error: error.message, code: 'UNREPRESENTABLE_POLICY' });
    return;
  }

  logger.error('GcPolicyRoutes: Unhandled error', {
    method: req.method,
    path: req.path,
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  res.status(500).json({ error: 'Internal server error', code: 'INTERNAL' });
}
