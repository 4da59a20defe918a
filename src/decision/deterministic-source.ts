/**
 * Deterministic fallback decisions
 *
 * Every function here is pure in its inputs: the same recipe, step and
 * catalog always produce the same plan, tool and ingredients. Answers are
 * always constrained to the catalog.
 */

import { toolsWithCapability } from '../catalog/catalog-provider';
import { Catalog, PLANNING_CAPABILITIES, PlanningCapability, Tool } from '../schemas/catalog.schema';
import type { PlanStep } from '../types/kitchen';
import { ok } from '../types/result';
import type {
  DecisionResult,
  DecisionSource,
  IngredientSelectionRequest,
  PlanRequest,
  ToolSelectionRequest,
} from './decision-source';

interface CannedPlan {
  keys: string[];
  steps: string[];
}

const CANNED_PLANS: CannedPlan[] = [
  {
    keys: ['chicken parm'],
    steps: [
      'Pound and bread the chicken',
      'Pan-fry until golden brown',
      'Assemble with sauce and cheese',
      'Bake until cheese melts',
    ],
  },
  {
    keys: ['pasta'],
    steps: [
      'Boil pasta in salted water',
      'Prepare the sauce',
      'Combine pasta with sauce',
      'Serve with cheese',
    ],
  },
  {
    keys: ['toast'],
    steps: [
      'Whisk eggs with milk and spices',
      'Dip bread slices in mixture',
      'Cook in buttered skillet until golden',
      'Serve with syrup',
    ],
  },
];

const GENERIC_STEPS: Record<PlanningCapability, string> = {
  prep: 'Prepare ingredients',
  heat: 'Cook main components',
  combine: 'Combine and finish',
  serve: 'Serve hot',
};

export const MINIMAL_PLAN_STEP = 'Prepare and serve';

interface ToolRule {
  keywords: string[];
  /** Preferred tool when the catalog has it */
  tool: string;
  /** Capability to fall back on when it does not */
  capability: string;
}

// Checked in order; the first rule with a matching keyword wins
const TOOL_RULES: ToolRule[] = [
  { keywords: ['pound', 'chop', 'cut'], tool: 'Chopping Board', capability: 'cut' },
  { keywords: ['bread', 'mix', 'combine', 'whisk'], tool: 'Mixing Bowl', capability: 'mix' },
  { keywords: ['pan-fry', 'fry', 'saute'], tool: 'Skillet', capability: 'fry' },
  { keywords: ['bake', 'roast'], tool: 'Oven', capability: 'bake' },
  { keywords: ['boil', 'simmer'], tool: 'Saucepan', capability: 'boil' },
  { keywords: ['drain', 'strain'], tool: 'Strainer', capability: 'drain' },
  { keywords: ['prepare', 'prep'], tool: 'Chopping Board', capability: 'prep' },
  { keywords: ['cook', 'heat', 'melt'], tool: 'Skillet', capability: 'heat' },
];

const DEFAULT_TOOL_RULE: ToolRule = { keywords: [], tool: 'Spatula', capability: 'serve' };

interface IngredientRule {
  keywords: string[];
  ingredients: string[];
}

const INGREDIENT_RULES: IngredientRule[] = [
  { keywords: ['chicken'], ingredients: ['Chicken Breast', 'Salt', 'Black Pepper'] },
  { keywords: ['pasta', 'boil'], ingredients: ['Pasta', 'Salt', 'Water'] },
  { keywords: ['sauce'], ingredients: ['Tomato Sauce', 'Garlic', 'Onion'] },
  { keywords: ['cheese'], ingredients: ['Parmesan Cheese', 'Mozzarella Cheese'] },
  { keywords: ['bread'], ingredients: ['Breadcrumbs', 'Flour', 'Eggs'] },
  { keywords: ['toast'], ingredients: ['Bread', 'Eggs', 'Milk', 'Butter'] },
];

function matches(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
}

function pick<T>(items: readonly T[], ordinal: number): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[ordinal % items.length];
}

/**
 * Generic plan built from the planning capabilities the catalog covers
 */
export function synthesizePlan(catalog: Catalog): string[] {
  const steps = PLANNING_CAPABILITIES.filter(
    (capability) => toolsWithCapability(catalog, capability).length > 0
  ).map((capability) => GENERIC_STEPS[capability]);
  return steps.length > 0 ? steps : [MINIMAL_PLAN_STEP];
}

/**
 * Canned plan for a known recipe, else a plan synthesized from the catalog
 */
export function fallbackPlan(recipe: string, catalog: Catalog): string[] {
  const canned = CANNED_PLANS.find((plan) => matches(recipe, plan.keys));
  return canned ? [...canned.steps] : synthesizePlan(catalog);
}

function resolveRule(rule: ToolRule, ordinal: number, catalog: Catalog): Tool | undefined {
  const preferred = catalog.tools.find((tool) => tool.name === rule.tool);
  if (preferred) {
    return preferred;
  }
  return pick(toolsWithCapability(catalog, rule.capability), ordinal);
}

/**
 * Tool for a step: keyword rule, then the rule's capability, then
 * tools[ordinal % n]
 */
export function fallbackTool(step: PlanStep, catalog: Catalog): string {
  const rule = TOOL_RULES.find((candidate) => matches(step.description, candidate.keywords));
  const tool =
    (rule ? resolveRule(rule, step.ordinal, catalog) : undefined) ??
    resolveRule(DEFAULT_TOOL_RULE, step.ordinal, catalog) ??
    pick(catalog.tools, step.ordinal);

  if (!tool) {
    // Unreachable with a validated catalog, which always holds a tool
    throw new Error('Catalog has no tools');
  }
  return tool.name;
}

/**
 * Ingredients for a step from the first matching keyword rule, limited to
 * what the catalog has. May be empty.
 */
export function fallbackIngredients(step: PlanStep, catalog: Catalog): string[] {
  const rule = INGREDIENT_RULES.find((candidate) => matches(step.description, candidate.keywords));
  if (!rule) {
    return [];
  }
  const available = new Set(catalog.ingredients.map((ingredient) => ingredient.name));
  return rule.ingredients.filter((name) => available.has(name));
}

/**
 * DecisionSource that always answers with the deterministic rules
 */
export class DeterministicFallbackSource implements DecisionSource {
  readonly name = 'deterministic';

  async proposePlan(request: PlanRequest): Promise<DecisionResult<string[]>> {
    return ok(fallbackPlan(request.recipe, request.catalog));
  }

  async selectTool(request: ToolSelectionRequest): Promise<DecisionResult<string>> {
    return ok(fallbackTool(request.step, request.catalog));
  }

  async selectIngredients(request: IngredientSelectionRequest): Promise<DecisionResult<string[]>> {
    return ok(fallbackIngredients(request.step, request.catalog));
  }
}
