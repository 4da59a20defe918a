/**
 * Schema for the static catalog files (tools.json, ingredients.json)
 */

/**
 * A kitchen tool the run may use
 */
export interface Tool {
  /**
   * Unique display name, matched exactly against decisions
   */
  readonly name: string;

  /**
   * Capability tags (e.g. "prep", "heat", "combine", "serve")
   */
  readonly capabilities: readonly string[];

  /**
   * Relative usage cost (1-10); scales the simulated delay
   */
  readonly cost: number;
}

/**
 * An ingredient available to the run
 */
export interface Ingredient {
  /**
   * Unique display name
   */
  readonly name: string;

  /**
   * Grouping such as "dairy", "produce", "pantry"
   */
  readonly category: string;
}

/**
 * The fixed tool and ingredient sets for a run
 */
export interface Catalog {
  readonly tools: readonly Tool[];
  readonly ingredients: readonly Ingredient[];
}

/**
 * Capability tags the deterministic planner knows how to turn into steps
 */
export const PLANNING_CAPABILITIES = ['prep', 'heat', 'combine', 'serve'] as const;

export type PlanningCapability = (typeof PLANNING_CAPABILITIES)[number];

/**
 * Example of valid catalog contents
 */
export const exampleCatalog: Catalog = {
  tools: [
    { name: 'Chopping Board', capabilities: ['prep', 'cut'], cost: 1 },
    { name: 'Skillet', capabilities: ['heat', 'fry'], cost: 3 },
    { name: 'Spatula', capabilities: ['serve', 'flip'], cost: 1 },
  ],
  ingredients: [
    { name: 'Bread', category: 'bakery' },
    { name: 'Cheddar Cheese', category: 'dairy' },
    { name: 'Butter', category: 'dairy' },
  ],
};
