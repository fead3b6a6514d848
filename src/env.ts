import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

export const DEFAULT_GREETING_TEXT =
  'Hello. Welcome to the Supply Drop Resource Assistance Line. I can help you find Wildfire relief resources in Southern California and Hurricane Recovery Resources in Western North Carolina. How can I help?';

export const EnvSchema = z.object({
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(5000)),
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_REALTIME_URL: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('wss://api.openai.com/v1/realtime'),
  ),
  OPENAI_REALTIME_MODEL: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('gpt-4o-realtime-preview-2024-10-01'),
  ),
  PUBLIC_BASE_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  CALL_LOG_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('logs')),
  CALL_LOG_LEVEL: z.preprocess(emptyToUndefined, z.enum(['debug', 'info', 'error']).default('info')),
  PROMPTS_PATH: z.preprocess(emptyToUndefined, z.string().min(1).default('prompts.json')),
  RELAY_VOICE: z.preprocess(
    emptyToUndefined,
    z.enum(['alloy', 'ash', 'ballad', 'coral', 'echo', 'sage', 'shimmer', 'verse']).default('shimmer'),
  ),
  GREETING_TEXT: z.preprocess(emptyToUndefined, z.string().min(1).default(DEFAULT_GREETING_TEXT)),
  GREETING_FOLLOWUP_TEXT: z.preprocess(emptyToUndefined, z.string().min(1).default('How can I help?')),
  GREETING_VOICE: z.preprocess(emptyToUndefined, z.string().min(1).default('Polly.Matthew')),
  TURN_DETECTION: z.preprocess(emptyToUndefined, z.enum(['server_vad', 'none']).default('server_vad')),
  TURN_DETECTION_MODE: z.preprocess(emptyToUndefined, z.string().min(1).default('normal')),
  SPEECH_GAP_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(600)),
  SPEECH_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(6000)),
  MODEL_TEMPERATURE: z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(2).default(0.8)),
  AUDIO_FORMAT: z.preprocess(
    emptyToUndefined,
    z.enum(['g711_ulaw', 'g711_alaw', 'pcm16']).default('g711_ulaw'),
  ),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  return parsed.data;
}

export const env = parseEnv(process.env);
