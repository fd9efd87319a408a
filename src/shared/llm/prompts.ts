/**
 * LLM Prompts
 *
 * Common prompt utilities for LLM interactions.
 */

/**
 * Build a structured prompt with clear instructions
 */
export function buildStructuredPrompt(
  task: string,
  instructions: string[],
  sections: Array<{ title: string; body: string }> = [],
  outputFormat?: string
): string {
  let prompt = `${task}\n\n`;

  if (instructions.length > 0) {
    prompt += 'INSTRUCTIONS:\n';
    instructions.forEach((instruction, i) => {
      prompt += `${i + 1}. ${instruction}\n`;
    });
    prompt += '\n';
  }

  for (const section of sections) {
    prompt += `${section.title.toUpperCase()}:\n${section.body}\n\n`;
  }

  if (outputFormat) {
    prompt += `OUTPUT FORMAT:\n${outputFormat}\n`;
  }

  return prompt.trimEnd() + '\n';
}

/**
 * Normalize line endings and trim text before it goes into a prompt
 */
export function escapePromptText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .trim();
}

/**
 * Create a JSON description of an expected output shape
 */
export function describeJsonShape(shape: Record<string, unknown>): string {
  return JSON.stringify(shape, null, 2);
}
