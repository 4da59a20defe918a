/**
 * Tests for Schema Validators
 */

import { describe, it, expect } from 'vitest';
import { exampleCatalog } from './catalog.schema';
import { exampleRepoConfig } from './repo-config.schema';
import { parseJsonWith, validateIngredients, validateRepoConfig, validateTools } from './validators';

describe('validateTools', () => {
  it('should accept the example tools', () => {
    const result = validateTools(exampleCatalog.tools);
    expect(result.success).toBe(true);
    expect(result.data).toEqual(exampleCatalog.tools);
  });

  it('should fill in default capabilities and cost', () => {
    expect(validateTools([{ name: 'Ladle' }]).data).toEqual([{ name: 'Ladle', capabilities: [], cost: 1 }]);
  });

  it('should reject a blank name and an out-of-range cost', () => {
    const result = validateTools([{ name: '  ', cost: 11 }]);
    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      '0.name: Tool name cannot be empty',
      '0.cost: Number must be less than or equal to 10',
    ]);
  });

  it('should reject something that is not a list', () => {
    expect(validateTools({ name: 'Wok' }).success).toBe(false);
  });
});

describe('validateIngredients', () => {
  it('should trim names and default the category', () => {
    expect(validateIngredients([{ name: ' Rice ' }]).data).toEqual([{ name: 'Rice', category: 'other' }]);
  });

  it('should reject duplicates', () => {
    expect(validateIngredients([{ name: 'Rice' }, { name: 'Rice' }]).errors).toEqual([
      '(root): Duplicate ingredient name "Rice"',
    ]);
  });
});

describe('validateRepoConfig', () => {
  it('should accept the example config', () => {
    expect(validateRepoConfig(exampleRepoConfig)).toEqual({ success: true, data: exampleRepoConfig });
  });

  it('should accept an empty config', () => {
    expect(validateRepoConfig({}).success).toBe(true);
  });

  it('should reject unknown keys', () => {
    const result = validateRepoConfig({ colour: 'blue' });
    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["(root): Unrecognized key(s) in object: 'colour'"]);
  });

  it('should reject an unknown outcome mode', () => {
    expect(validateRepoConfig({ outcome: { mode: 'sometimes' } }).success).toBe(false);
  });
});

describe('parseJsonWith', () => {
  it('should report invalid JSON', () => {
    const result = parseJsonWith('{', validateRepoConfig);
    expect(result.success).toBe(false);
    expect(result.errors?.[0]).toMatch(/^Invalid JSON: /);
  });

  it('should validate parsed JSON', () => {
    expect(parseJsonWith('{"offline": true}', validateRepoConfig).data).toEqual({ offline: true });
  });
});
