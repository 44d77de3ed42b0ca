/**
 * Tag Instructions
 *
 * The instruction block appended to the model's system prompt so that it
 * wraps content worth rendering (formulas, tables, code) in the render tag.
 */

import { DEFAULT_TAG } from '../segment/segment.types.js';

export function buildTagInstructions(tag: string = DEFAULT_TAG): string {
  const open = `<${tag}>`;
  const close = `</${tag}>`;
  return [
    `[Rendering] Replies are delivered as chat messages that cannot display Markdown or LaTeX.`,
    `Wrap any part of your reply that needs rich formatting (math formulas, tables, code blocks, structured lists) in ${open}...${close}.`,
    `Content inside ${open}${close} is rendered to an image: write standard Markdown there, with $...$ for inline math and $$...$$ for display math.`,
    `Keep conversational text outside the tags as plain text. Do not nest ${open} tags and do not leave a tag unclosed.`,
  ].join('\n');
}

/**
 * Append the instruction block to a system prompt once.
 */
export function appendTagInstructions(systemPrompt: string, tag: string = DEFAULT_TAG): string {
  const instructions = buildTagInstructions(tag);
  if (systemPrompt.includes(instructions)) {
    return systemPrompt;
  }
  const base = systemPrompt.trimEnd();
  return base ? `${base}\n\n${instructions}` : instructions;
}
