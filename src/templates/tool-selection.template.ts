import { PromptTemplate } from './prompt-template';

/**
 * Asks for the single tool a step needs
 */
export function getToolSelectionTemplate(): PromptTemplate {
  return {
    description: 'Select one tool for a plan step',
    requiredVariables: ['recipe', 'step', 'tools'],
    template: `You are choosing the ONE tool needed for a step of "{{recipe}}".

Step: "{{step}}"

Available tools: {{tools}}

Guidance:
- Cutting, chopping and pounding use prep tools such as a Chopping Board.
- Mixing, whisking and breading use a Mixing Bowl or Whisk.
- Frying and sauteing use a Skillet; baking and roasting use an Oven.
- Boiling and simmering use a Saucepan; draining uses a Strainer.
- Assembling, topping and serving use a Spatula.

Return ONLY the exact tool name from the list.`,
  };
}
