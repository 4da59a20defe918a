/**
 * Schema Validation with Zod
 * Runtime validation for catalog files and the repository config file
 */

import { z } from 'zod';
import type { Ingredient, Tool } from './catalog.schema';
import type { RepoConfig } from './repo-config.schema';

/**
 * Validation result type
 */
export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
}

function duplicateNames(items: ReadonlyArray<{ name: string }>): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const item of items) {
    if (seen.has(item.name)) {
      duplicates.add(item.name);
    }
    seen.add(item.name);
  }
  return [...duplicates];
}

// =============================================================================
// Catalog Schemas
// =============================================================================

export const toolSchema = z.object({
  name: z.string().trim().min(1, 'Tool name cannot be empty'),
  capabilities: z.array(z.string().trim().min(1)).default([]),
  cost: z.number().int().min(1).max(10).default(1),
});

export const ingredientSchema = z.object({
  name: z.string().trim().min(1, 'Ingredient name cannot be empty'),
  category: z.string().trim().min(1).default('other'),
});

export const toolListSchema = z
  .array(toolSchema)
  .min(1, 'At least one tool is required')
  .superRefine((tools, ctx) => {
    for (const name of duplicateNames(tools)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate tool name "${name}"` });
    }
  });

export const ingredientListSchema = z
  .array(ingredientSchema)
  .min(1, 'At least one ingredient is required')
  .superRefine((ingredients, ctx) => {
    for (const name of duplicateNames(ingredients)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate ingredient name "${name}"` });
    }
  });

/**
 * Validate the contents of tools.json
 */
export function validateTools(data: unknown): ValidationResult<Tool[]> {
  const result = toolListSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Validate the contents of ingredients.json
 */
export function validateIngredients(data: unknown): ValidationResult<Ingredient[]> {
  const result = ingredientListSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

// =============================================================================
// Repository Config Schema
// =============================================================================

const outcomePolicySchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('always-succeed') }),
  z.object({ mode: z.literal('fail-steps'), ordinals: z.array(z.number().int().nonnegative()) }),
  z.object({ mode: z.literal('fail-tools'), tools: z.array(z.string().min(1)) }),
]);

export const repoConfigSchema = z
  .object({
    planModel: z.string().min(1),
    selectionModel: z.string().min(1),
    baseUrl: z.string().url(),
    decisionTimeoutMs: z.number().int().positive(),
    maxPlanSteps: z.number().int().positive(),
    offline: z.boolean(),
    msPerCostUnit: z.number().nonnegative(),
    maxDelayMs: z.number().nonnegative(),
    pollIntervalMs: z.number().int().positive(),
    dataDirectory: z.string().min(1),
    outcome: outcomePolicySchema,
  })
  .partial()
  .strict();

/**
 * Validate a parsed .chef/config.json
 */
export function validateRepoConfig(data: unknown): ValidationResult<RepoConfig> {
  const result = repoConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Parse JSON text and validate it with the given validator
 */
export function parseJsonWith<T>(
  json: string,
  validate: (data: unknown) => ValidationResult<T>
): ValidationResult<T> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (e) {
    return {
      success: false,
      errors: [`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`],
    };
  }
  return validate(data);
}
