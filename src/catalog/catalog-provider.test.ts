/**
 * Tests for catalog loading
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { join } from 'path';
import { createTempDirContext, TempDirContext } from '../../tests/utils/temp-directory';
import { exampleCatalog } from '../schemas/catalog.schema';
import { CatalogLoadError } from '../types/errors';
import {
  FileCatalogProvider,
  findTool,
  getDefaultDataDirectory,
  ingredientNames,
  StaticCatalogProvider,
  toolNames,
  toolsWithCapability,
} from './catalog-provider';

function loadError(load: () => unknown): CatalogLoadError {
  try {
    load();
  } catch (error) {
    if (error instanceof CatalogLoadError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the catalog to fail loading');
}

describe('FileCatalogProvider', () => {
  let temp: TempDirContext;

  beforeEach(() => {
    temp = createTempDirContext();
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('should load and freeze both catalog files', () => {
    temp.writeJson('tools.json', [{ name: 'Wok', capabilities: ['heat', 'fry'], cost: 2 }]);
    temp.writeJson('ingredients.json', [{ name: 'Rice' }]);

    const catalog = new FileCatalogProvider(temp.path).load();

    expect(catalog.tools).toEqual([{ name: 'Wok', capabilities: ['heat', 'fry'], cost: 2 }]);
    expect(catalog.ingredients).toEqual([{ name: 'Rice', category: 'other' }]);
    expect(Object.isFrozen(catalog.tools)).toBe(true);
    expect(Object.isFrozen(catalog.tools[0].capabilities)).toBe(true);
  });

  it('should fail when a file is missing', () => {
    temp.writeJson('tools.json', [{ name: 'Wok' }]);
    const error = loadError(() => new FileCatalogProvider(temp.path).load());

    expect(error.message).toBe(`Catalog file not found: ${join(temp.path, 'ingredients.json')}`);
    expect(error.path).toBe(join(temp.path, 'ingredients.json'));
  });

  it('should fail on a file that is not JSON', () => {
    temp.writeFile('tools.json', '[{"name": ');
    temp.writeJson('ingredients.json', [{ name: 'Rice' }]);
    const error = loadError(() => new FileCatalogProvider(temp.path).load());

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^Invalid JSON: /);
  });

  it('should report duplicate and empty entries', () => {
    temp.writeJson('tools.json', [{ name: 'Wok' }, { name: 'Wok' }]);
    temp.writeJson('ingredients.json', []);

    expect(loadError(() => new FileCatalogProvider(temp.path).load()).issues).toEqual([
      '(root): Duplicate tool name "Wok"',
    ]);

    temp.writeJson('tools.json', [{ name: 'Wok' }]);
    expect(loadError(() => new FileCatalogProvider(temp.path).load()).issues).toEqual([
      '(root): At least one ingredient is required',
    ]);
  });

  it('should load the catalog shipped with the package', () => {
    const catalog = new FileCatalogProvider(getDefaultDataDirectory()).load();
    expect(catalog.tools).toHaveLength(15);
    expect(findTool(catalog, 'Mixing Bowl')?.capabilities).toEqual(['combine', 'mix']);
    expect(ingredientNames(catalog)).toContain('Cheddar Cheese');
  });
});

describe('StaticCatalogProvider', () => {
  it('should reject an invalid tool list', () => {
    expect(() => new StaticCatalogProvider([], exampleCatalog.ingredients)).toThrow(
      'Invalid tools: (root): At least one tool is required'
    );
  });

  it('should serve the same frozen catalog on every load', () => {
    const provider = new StaticCatalogProvider(exampleCatalog.tools, exampleCatalog.ingredients);
    expect(provider.load()).toBe(provider.load());
    expect(Object.isFrozen(provider.load())).toBe(true);
  });
});

describe('catalog lookups', () => {
  const catalog = new StaticCatalogProvider(exampleCatalog.tools, exampleCatalog.ingredients).load();

  it('should find tools by exact name', () => {
    expect(findTool(catalog, 'Skillet')?.cost).toBe(3);
    expect(findTool(catalog, 'skillet')).toBeUndefined();
  });

  it('should list tools by capability in catalog order', () => {
    expect(toolsWithCapability(catalog, 'heat').map((tool) => tool.name)).toEqual(['Skillet']);
    expect(toolsWithCapability(catalog, 'bake')).toEqual([]);
  });

  it('should list names', () => {
    expect(toolNames(catalog)).toEqual(['Chopping Board', 'Skillet', 'Spatula']);
    expect(ingredientNames(catalog)).toEqual(['Bread', 'Cheddar Cheese', 'Butter']);
  });
});
