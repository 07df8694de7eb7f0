/**
 * backend/src/modules/posts/index.ts
 *
 * Public surface of the posts module (comments look up their post).
 */

export { getPostById } from './queries/post.queries';
export type { Post } from './post.types';
