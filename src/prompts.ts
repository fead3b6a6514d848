import fs from 'fs';
import { z } from 'zod';
import { log } from './log';

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful AI assistant.';

const PromptsFileSchema = z
  .object({
    system_message: z
      .object({
        content: z.string().min(1),
      })
      .passthrough(),
  })
  .passthrough();

/**
 * Reads the system instructions from a prompts JSON file
 * (`{ "system_message": { "content": "..." } }`), falling back to a generic
 * assistant prompt when the file is missing or malformed.
 */
export function loadSystemPrompt(filePath: string): string {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    log.error({ err: error, path: filePath }, 'error loading system prompt');
    return DEFAULT_SYSTEM_PROMPT;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    log.error({ err: error, path: filePath }, 'system prompt file is not valid JSON');
    return DEFAULT_SYSTEM_PROMPT;
  }

  const parsed = PromptsFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    log.error({ path: filePath, issues }, 'system prompt file is invalid');
    return DEFAULT_SYSTEM_PROMPT;
  }

  return parsed.data.system_message.content;
}
