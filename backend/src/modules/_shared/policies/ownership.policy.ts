/**
 * backend/src/modules/_shared/policies/ownership.policy.ts
 *
 * WHY:
 * - Who may mutate what is data, not scattered if-statements.
 * - Posts and comments belong to their author; categories and tags are shared
 *   taxonomy any signed-in user may edit.
 *
 * RULES:
 * - Pure functions only (no DB / no I/O).
 * - Throws AppError.forbidden so the error handler maps it to 403.
 */

import { AppError } from '../../../shared/http/errors';

export type ResourceKind = 'post' | 'comment' | 'category' | 'tag';

export type MutationAction = 'update' | 'delete' | 'approve';

export type MutationRule = 'owner' | 'authenticated';

export const MUTATION_POLICY: Readonly<Record<ResourceKind, MutationRule>> = {
  post: 'owner',
  comment: 'owner',
  category: 'authenticated',
  tag: 'authenticated',
};

export type Identity = { id: string };

export function authorizeOwner(resource: { authorId: string }, identity: Identity): boolean {
  return resource.authorId === identity.id;
}

export function assertCanMutate(input: {
  kind: ResourceKind;
  action: MutationAction;
  resource: { id: string; authorId: string | null };
  identity: Identity;
}): void {
  if (MUTATION_POLICY[input.kind] === 'authenticated') return;

  const { authorId } = input.resource;
  if (authorId !== null && authorizeOwner({ authorId }, input.identity)) return;

  throw AppError.forbidden(`Not authorized to ${input.action} this ${input.kind}`, {
    kind: input.kind,
    resourceId: input.resource.id,
    actorId: input.identity.id,
  });
}
