/**
 * backend/src/shared/db/lifecycle.ts
 *
 * Soft delete as a value: domain entities carry `lifecycle` instead of a
 * nullable timestamp. Read queries filter `deleted_at IS NULL`, so they only
 * ever produce `active`.
 */

export type Lifecycle = { state: 'active' } | { state: 'deleted'; at: Date };

export function lifecycleFromDeletedAt(deletedAt: Date | null): Lifecycle {
  return deletedAt ? { state: 'deleted', at: deletedAt } : { state: 'active' };
}

export type Audit = {
  dateAdded: Date;
  dateUpdated: Date;
  addedBy: string | null;
  updatedBy: string | null;
};
