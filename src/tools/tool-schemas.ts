/**
 * Tool Schemas
 *
 * Zod input schemas for the MCP tools.
 */

import { z } from 'zod';

export const RenderMarkdownInputSchema = z.object({
  content: z.string().min(1).describe('Markdown source, math in $...$ or $$...$$'),
  scale_factor: z
    .number()
    .int()
    .min(1)
    .max(4)
    .optional()
    .describe('Device scale factor; higher values give sharper images'),
  min_width: z.number().int().positive().optional().describe('Minimum image width in CSS pixels'),
  width: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Fixed image width in CSS pixels (disables auto-fit)'),
});

export const RenderReplyInputSchema = z.object({
  text: z.string().describe('Model reply that may contain tagged render spans'),
  sanitize: z
    .boolean()
    .optional()
    .describe('Strip Markdown from text outside render spans (defaults to server setting)'),
});

export const GetTagInstructionsInputSchema = z.object({
  system_prompt: z
    .string()
    .optional()
    .describe('System prompt to extend; omit to get the instruction block alone'),
});
