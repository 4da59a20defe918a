/**
 * Catalog module - tool and ingredient lookup
 */

export type { CatalogProvider } from './catalog-provider';
export {
  FileCatalogProvider,
  StaticCatalogProvider,
  TOOLS_FILE,
  INGREDIENTS_FILE,
  getDefaultDataDirectory,
  freezeCatalog,
  findTool,
  toolsWithCapability,
  toolNames,
  ingredientNames,
} from './catalog-provider';
