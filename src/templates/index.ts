/**
 * Prompt templates for the remote decision source
 */
export type { PromptTemplate } from './prompt-template';
export { interpolateTemplate } from './prompt-template';
export { getPlanTemplate } from './plan.template';
export { getToolSelectionTemplate } from './tool-selection.template';
export { getIngredientSelectionTemplate } from './ingredient-selection.template';
