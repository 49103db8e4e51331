/**
 * GcPolicyManager Unit Tests
 *
 * Store is mocked; every case checks which store calls were made.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GcPolicyManager } from '../../../src/services/gc-policy-manager';
import { InvalidRuleCountError } from '../../../src/rules/gc-rule.errors';
import { StoreError } from '../../../src/stores/gc-policy-store.interface';
import type { ColumnFamilyRef } from '../../../src/rules/gc-rule.types';

const target: ColumnFamilyRef = {
  tableRef: 'projects/test-project/instances/test-instance/tables/events',
  columnFamilyId: 'cf1',
};

describe('GcPolicyManager', () => {
  let manager: GcPolicyManager;
  let mockStore: any;

  beforeEach(() => {
    mockStore = {
      setGcPolicy: vi.fn().mockImplementation(async (_target, policy) => policy),
      getGcPolicy: vi.fn(),
      listGcPolicies: vi.fn(),
    };
    manager = new GcPolicyManager(mockStore);
  });

  describe('apply', () => {
    it('should apply a single max_version rule', async () => {
      const applied = await manager.apply(target, { rules: [{ max_version: 10 }] }, 'default');

      expect(mockStore.setGcPolicy).toHaveBeenCalledTimes(1);
      expect(mockStore.setGcPolicy).toHaveBeenCalledWith(target, { type: 'max_versions', count: 10 }, undefined);
      expect(applied).toEqual({ type: 'max_versions', count: 10 });
    });

    it('should apply a union of max_age and max_version', async () => {
      await manager.apply(target, { mode: 'union', rules: [{ max_age: '168h' }, { max_version: 10 }] }, 'default');

      expect(mockStore.setGcPolicy).toHaveBeenCalledWith(
        target,
        {
          type: 'union',
          children: [
            { type: 'max_age', seconds: 604800 },
            { type: 'max_versions', count: 10 },
          ],
        },
        undefined
      );
    });

    it('should apply no_gc when no rule is given', async () => {
      await manager.apply(target, undefined, 'default');

      expect(mockStore.setGcPolicy).toHaveBeenCalledWith(target, { type: 'no_gc' }, undefined);
    });

    it('should forward call options to the store', async () => {
      const options = { timeoutMs: 1000 };

      await manager.apply(target, { max_version: 1 }, 'abandon', options);

      expect(mockStore.setGcPolicy).toHaveBeenCalledWith(target, { type: 'max_versions', count: 1 }, options);
    });

    it('should not call the store when validation fails', async () => {
      await expect(
        manager.apply(target, { rules: [{ max_age: '1h' }, { max_version: 1 }] }, 'default')
      ).rejects.toBeInstanceOf(InvalidRuleCountError);

      expect(mockStore.setGcPolicy).not.toHaveBeenCalled();
    });

    it('should propagate store failures', async () => {
      mockStore.setGcPolicy.mockRejectedValue(new StoreError('UNAVAILABLE', 'backend down'));

      await expect(manager.apply(target, { max_version: 1 }, 'default')).rejects.toMatchObject({
        code: 'UNAVAILABLE',
      });
    });
  });

  describe('read', () => {
    it('should return the canonical rule JSON', async () => {
      mockStore.getGcPolicy.mockResolvedValue({
        type: 'intersection',
        children: [
          { type: 'max_age', seconds: 3600 },
          { type: 'max_versions', count: 2 },
        ],
      });

      expect(await manager.read(target)).toEqual({
        mode: 'intersection',
        rules: [{ max_age: '1h' }, { max_version: 2 }],
      });
    });

    it('should return undefined when the family has no policy', async () => {
      mockStore.getGcPolicy.mockResolvedValue(null);

      expect(await manager.read(target)).toBeUndefined();
    });

    it('should return undefined when the family is not found', async () => {
      mockStore.getGcPolicy.mockRejectedValue(new StoreError('NOT_FOUND', 'Column family cf1 not found'));

      expect(await manager.read(target)).toBeUndefined();
    });

    it('should propagate other store errors', async () => {
      mockStore.getGcPolicy.mockRejectedValue(new StoreError('PERMISSION_DENIED', 'denied'));

      await expect(manager.read(target)).rejects.toMatchObject({ code: 'PERMISSION_DENIED' });
    });
  });

  describe('release', () => {
    it('should reset the policy to no_gc by default', async () => {
      await manager.release(target, 'default');

      expect(mockStore.setGcPolicy).toHaveBeenCalledTimes(1);
      expect(mockStore.setGcPolicy).toHaveBeenCalledWith(target, { type: 'no_gc' }, undefined);
    });

    it('should make no store call when abandoning', async () => {
      await manager.release(target, 'abandon');

      expect(mockStore.setGcPolicy).not.toHaveBeenCalled();
      expect(mockStore.getGcPolicy).not.toHaveBeenCalled();
    });
  });

  describe('list', () => {
    it('should decompile every listed policy', async () => {
      mockStore.listGcPolicies.mockResolvedValue([
        { columnFamilyId: 'audit', policy: { type: 'max_versions', count: 1 } },
        { columnFamilyId: 'raw', policy: { type: 'no_gc' } },
        { columnFamilyId: 'metrics', policy: { type: 'max_age', seconds: 86400 } },
      ]);

      expect(await manager.list(target.tableRef)).toEqual([
        { columnFamilyId: 'audit', gcRules: { max_version: 1 } },
        { columnFamilyId: 'metrics', gcRules: { max_age: '24h' } },
      ]);
    });
  });

  describe('detectDrift', () => {
    it('should not report drift for equivalent durations', async () => {
      mockStore.getGcPolicy.mockResolvedValue({ type: 'max_age', seconds: 3600 });

      const report = await manager.detectDrift(target, { rules: [{ max_age: '60m' }] });

      expect(report.drifted).toBe(false);
    });

    it('should not report drift against a 1-child union read back from the store', async () => {
      mockStore.getGcPolicy.mockResolvedValue({ type: 'union', children: [{ type: 'max_versions', count: 5 }] });

      const report = await manager.detectDrift(target, { max_version: 5 });

      expect(report.drifted).toBe(false);
    });

    it('should report drift when the live policy differs', async () => {
      mockStore.getGcPolicy.mockResolvedValue({ type: 'max_versions', count: 3 });

      const report = await manager.detectDrift(target, { max_version: 5 });

      expect(report).toEqual({
        drifted: true,
        desired: { type: 'max_versions', count: 5 },
        live: { type: 'max_versions', count: 3 },
      });
    });

    it('should treat a missing family as no_gc', async () => {
      mockStore.getGcPolicy.mockRejectedValue(new StoreError('NOT_FOUND', 'missing'));

      const report = await manager.detectDrift(target, undefined);

      expect(report).toEqual({ drifted: false, desired: { type: 'no_gc' }, live: { type: 'no_gc' } });
    });
  });
});
