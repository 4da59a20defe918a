/**
 * Catalog Provider
 * Supplies the fixed tool and ingredient sets shared by every run
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { Catalog, Ingredient, Tool } from '../schemas/catalog.schema';
import {
  ValidationResult,
  parseJsonWith,
  validateIngredients,
  validateTools,
} from '../schemas/validators';
import { CatalogLoadError, describeError } from '../types/errors';

export const TOOLS_FILE = 'tools.json';
export const INGREDIENTS_FILE = 'ingredients.json';

/**
 * Source of the catalog for a process
 */
export interface CatalogProvider {
  /**
   * Load the catalog
   * @throws CatalogLoadError if the backing data is missing or malformed
   */
  load(): Catalog;
}

/**
 * Directory holding the catalog files shipped with the package
 * (resolves the same from src/catalog and dist/catalog)
 */
export function getDefaultDataDirectory(): string {
  return resolve(__dirname, '..', '..', 'data');
}

/**
 * Freeze a catalog and everything in it
 */
export function freezeCatalog(tools: readonly Tool[], ingredients: readonly Ingredient[]): Catalog {
  return Object.freeze({
    tools: Object.freeze(
      tools.map((tool) =>
        Object.freeze({ ...tool, capabilities: Object.freeze([...tool.capabilities]) })
      )
    ),
    ingredients: Object.freeze(ingredients.map((ingredient) => Object.freeze({ ...ingredient }))),
  });
}

function readCatalogFile<T>(
  path: string,
  validate: (data: unknown) => ValidationResult<T>
): T {
  if (!existsSync(path)) {
    throw new CatalogLoadError(`Catalog file not found: ${path}`, path);
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new CatalogLoadError(`Failed to read catalog file ${path}: ${describeError(error)}`, path);
  }

  const result = parseJsonWith(content, validate);
  if (!result.success || result.data === undefined) {
    const issues = result.errors ?? [];
    throw new CatalogLoadError(
      `Invalid catalog file ${path}: ${issues.join('; ')}`,
      path,
      issues
    );
  }
  return result.data;
}

/**
 * Reads tools.json and ingredients.json from a directory
 */
export class FileCatalogProvider implements CatalogProvider {
  private readonly dataDirectory: string;

  constructor(dataDirectory: string = getDefaultDataDirectory()) {
    this.dataDirectory = dataDirectory;
  }

  load(): Catalog {
    const tools = readCatalogFile(join(this.dataDirectory, TOOLS_FILE), validateTools);
    const ingredients = readCatalogFile(
      join(this.dataDirectory, INGREDIENTS_FILE),
      validateIngredients
    );
    return freezeCatalog(tools, ingredients);
  }
}

/**
 * Serves an in-memory catalog
 */
export class StaticCatalogProvider implements CatalogProvider {
  private readonly catalog: Catalog;

  constructor(tools: readonly Tool[], ingredients: readonly Ingredient[]) {
    const toolResult = validateTools(tools);
    if (!toolResult.success || toolResult.data === undefined) {
      throw new CatalogLoadError(`Invalid tools: ${(toolResult.errors ?? []).join('; ')}`);
    }
    const ingredientResult = validateIngredients(ingredients);
    if (!ingredientResult.success || ingredientResult.data === undefined) {
      throw new CatalogLoadError(
        `Invalid ingredients: ${(ingredientResult.errors ?? []).join('; ')}`
      );
    }
    this.catalog = freezeCatalog(toolResult.data, ingredientResult.data);
  }

  load(): Catalog {
    return this.catalog;
  }
}

/**
 * Look up a tool by its exact name
 */
export function findTool(catalog: Catalog, name: string): Tool | undefined {
  return catalog.tools.find((tool) => tool.name === name);
}

/**
 * Tools carrying a capability tag, in catalog order
 */
export function toolsWithCapability(catalog: Catalog, capability: string): Tool[] {
  return catalog.tools.filter((tool) => tool.capabilities.includes(capability));
}

export function toolNames(catalog: Catalog): string[] {
  return catalog.tools.map((tool) => tool.name);
}

export function ingredientNames(catalog: Catalog): string[] {
  return catalog.ingredients.map((ingredient) => ingredient.name);
}
