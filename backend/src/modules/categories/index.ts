/**
 * backend/src/modules/categories/index.ts
 *
 * Public surface of the categories module (posts embed categories).
 */

export { getCategoryById, getCategoriesByIds } from './queries/category.queries';
export { toCategoryResponse } from './category.types';
export type { Category, CategoryResponse } from './category.types';
