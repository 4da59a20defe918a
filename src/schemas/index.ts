/**
 * Catalog and repo config schemas with their zod validators
 */

export type { Tool, Ingredient, Catalog, PlanningCapability } from './catalog.schema';
export { PLANNING_CAPABILITIES, exampleCatalog } from './catalog.schema';

export type { RepoConfig } from './repo-config.schema';
export { exampleRepoConfig } from './repo-config.schema';

export type { ValidationResult } from './validators';
export {
  toolSchema,
  ingredientSchema,
  toolListSchema,
  ingredientListSchema,
  repoConfigSchema,
  validateTools,
  validateIngredients,
  validateRepoConfig,
  parseJsonWith,
} from './validators';
