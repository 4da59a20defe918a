import { PromptTemplate } from './prompt-template';

/**
 * Asks for the ingredients handled in one step
 */
export function getIngredientSelectionTemplate(): PromptTemplate {
  return {
    description: 'Select the ingredients used by a plan step',
    requiredVariables: ['recipe', 'step', 'previousSteps', 'ingredients'],
    template: `List the ingredients actively handled in this step of "{{recipe}}".

Current step: "{{step}}"
Steps already completed: {{previousSteps}}

Available ingredients: {{ingredients}}

Rules:
- Include only ingredients this step names or directly works with.
- Do not carry over ingredients from completed steps unless this step uses them again.
- Use the exact names from the available list.

Return ONLY the ingredient names, separated by commas.`,
  };
}
