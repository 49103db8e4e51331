/**
 * ColumnFamilyPolicyRepository Unit Tests
 *
 * Repository pattern for gc_policy.column_family_policies table access.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ColumnFamilyPolicyRepository } from '../../../src/repositories/column-family-policy.repository';

describe('ColumnFamilyPolicyRepository', () => {
  let repository: ColumnFamilyPolicyRepository;
  let mockDb: any;

  beforeEach(() => {
    mockDb = {
      any: vi.fn(),
      one: vi.fn(),
      oneOrNone: vi.fn(),
      none: vi.fn(),
    };
    repository = new ColumnFamilyPolicyRepository(mockDb);
  });

  it('should find enabled, unreleased records', async () => {
    const rows = [
      {
        id: 'policy-1',
        table_ref: 'projects/test-project/instances/test-instance/tables/events',
        column_family_id: 'cf1',
        gc_rules: { max_version: 1 },
        deletion_mode: 'default',
        desired_state: 'present',
        enabled: true,
      },
    ];
    mockDb.any.mockResolvedValue(rows);

    const result = await repository.findManaged();

    expect(mockDb.any).toHaveBeenCalledWith(expect.stringContaining('WHERE enabled = true AND released_at IS NULL'));
    expect(result).toEqual(rows);
  });

  it('should find the record of one column family', async () => {
    mockDb.oneOrNone.mockResolvedValue(null);

    const result = await repository.findByFamily('projects/test-project/instances/test-instance/tables/events', 'cf1');

    expect(result).toBeNull();
    expect(mockDb.oneOrNone).toHaveBeenCalledWith(
      expect.stringContaining('WHERE table_ref = $1 AND column_family_id = $2'),
      ['projects/test-project/instances/test-instance/tables/events', 'cf1']
    );
  });

  it('should upsert an applied policy with its deletion mode', async () => {
    const timestamp = new Date('2026-03-01T00:00:00Z');
    mockDb.one.mockResolvedValue({ id: 'policy-1' });

    await repository.upsertApplied(
      {
        table_ref: 'projects/test-project/instances/test-instance/tables/events',
        column_family_id: 'cf1',
        gc_rules: { rules: [{ max_version: 1 }] },
        deletion_mode: 'abandon',
      },
      timestamp
    );

    expect(mockDb.one).toHaveBeenCalledWith(expect.stringContaining('ON CONFLICT (table_ref, column_family_id)'), [
      'projects/test-project/instances/test-instance/tables/events',
      'cf1',
      '{"rules":[{"max_version":1}]}',
      'abandon',
      timestamp,
    ]);
  });

  it('should update last applied timestamp', async () => {
    const timestamp = new Date('2026-03-01T00:00:00Z');

    await repository.updateLastApplied('policy-1', timestamp);

    expect(mockDb.none).toHaveBeenCalledWith(expect.stringContaining('SET last_applied_at = $2'), [
      'policy-1',
      timestamp,
    ]);
  });

  it('should mark a record released on the given queryable', async () => {
    const timestamp = new Date('2026-03-01T00:00:00Z');
    const tx = { none: vi.fn(), any: vi.fn(), one: vi.fn(), oneOrNone: vi.fn() };

    await repository.markReleased('policy-1', timestamp, tx);

    expect(tx.none).toHaveBeenCalledWith(expect.stringContaining('SET released_at = $2'), ['policy-1', timestamp]);
    expect(mockDb.none).not.toHaveBeenCalled();
  });
});
