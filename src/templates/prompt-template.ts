/**
 * Prompt templates with {{variable}} placeholders
 */
export interface PromptTemplate {
  /**
   * The template string with placeholders (e.g., "{{recipe}}")
   */
  template: string;

  /**
   * What the prompt asks the model to decide
   */
  description?: string;

  /**
   * Variables that must be supplied to interpolate the template
   */
  requiredVariables?: string[];
}

/**
 * Interpolate variables into a template
 * @throws Error if a required variable is missing
 */
export function interpolateTemplate(
  template: PromptTemplate,
  variables: Record<string, string>
): string {
  const missing = (template.requiredVariables ?? []).filter((name) => !(name in variables));
  if (missing.length > 0) {
    throw new Error(`Missing required variables: ${missing.join(', ')}`);
  }

  return template.template.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) =>
    name in variables ? variables[name] : placeholder
  );
}
