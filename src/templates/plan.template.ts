import { PromptTemplate } from './prompt-template';

/**
 * Asks for the high-level cooking phases of a recipe
 */
export function getPlanTemplate(): PromptTemplate {
  return {
    description: 'Propose an ordered cooking plan',
    requiredVariables: ['recipe', 'tools', 'ingredients', 'maxSteps'],
    template: `You are a professional chef writing instructions for a robot cook.

Recipe: {{recipe}}

Available tools: {{tools}}
Available ingredients: {{ingredients}}

Rules:
- Use only the tools and ingredients listed above, with their exact names.
- Write between 1 and {{maxSteps}} steps.
- Each step is one major cooking phase (for example "Pan-fry the cutlets until golden brown"), not a micro-instruction.
- The cook already knows basic prep work such as measuring and setting up.

Return ONLY a numbered list, one step per line.`,
  };
}
