/**
 * backend/src/modules/tags/index.ts
 *
 * Public surface of the tags module (posts embed tags).
 */

export { getTagById, getTagsByIds } from './queries/tag.queries';
export { toTagResponse } from './tag.types';
export type { Tag, TagResponse } from './tag.types';
