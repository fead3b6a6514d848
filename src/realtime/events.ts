import { z } from 'zod';

export const LOGGABLE_EVENT_TYPES: ReadonlySet<string> = new Set([
  'response.content.done',
  'rate_limits.updated',
  'response.done',
  'input_audio_buffer.committed',
  'input_audio_buffer.speech_stopped',
  'input_audio_buffer.speech_started',
  'session.created',
  'turn.start',
  'turn.end',
]);

const ModelEventSchema = z.object({ type: z.string().min(1) }).passthrough();

const TurnEventSchema = z
  .object({
    type: z.enum(['turn.start', 'turn.end']),
    turn: z.object({ id: z.string().min(1).optional() }).passthrough().optional(),
  })
  .passthrough();

const AudioDeltaEventSchema = z
  .object({
    type: z.literal('response.audio.delta'),
    delta: z.string().optional(),
    response_id: z.string().optional(),
    item_id: z.string().optional(),
  })
  .passthrough();

const ErrorEventSchema = z
  .object({
    type: z.literal('error'),
    error: z
      .object({
        type: z.string().optional(),
        code: z.string().nullish(),
        message: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type ModelEvent = z.infer<typeof ModelEventSchema>;

export type ClassifiedModelEvent =
  | { kind: 'turn_start'; turnId: string | null }
  | { kind: 'turn_end'; turnId: string | null }
  | { kind: 'audio_delta'; delta: string | null; responseId: string | null }
  | { kind: 'error'; code: string | null; message: string }
  | { kind: 'other' };

export type ModelEventParseResult =
  | { ok: true; event: ModelEvent }
  | { ok: false; detail: string };

export function parseModelEvent(text: string): ModelEventParseResult {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    return { ok: false, detail: error instanceof Error ? error.message : String(error) };
  }

  const parsed = ModelEventSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, detail: 'event has no type' };
  }
  return { ok: true, event: parsed.data };
}

export function isLoggableEvent(type: string): boolean {
  return LOGGABLE_EVENT_TYPES.has(type);
}

export function classifyModelEvent(event: ModelEvent): ClassifiedModelEvent {
  switch (event.type) {
    case 'turn.start':
    case 'turn.end': {
      const turn = TurnEventSchema.safeParse(event);
      const turnId = turn.success ? turn.data.turn?.id ?? null : null;
      return event.type === 'turn.start' ? { kind: 'turn_start', turnId } : { kind: 'turn_end', turnId };
    }
    case 'response.audio.delta': {
      const delta = AudioDeltaEventSchema.safeParse(event);
      if (!delta.success) {
        return { kind: 'audio_delta', delta: null, responseId: null };
      }
      return {
        kind: 'audio_delta',
        delta: delta.data.delta && delta.data.delta !== '' ? delta.data.delta : null,
        responseId: delta.data.response_id ?? null,
      };
    }
    case 'error': {
      const failure = ErrorEventSchema.safeParse(event);
      const details = failure.success ? failure.data.error : undefined;
      return {
        kind: 'error',
        code: details?.code ?? null,
        message: details?.message ?? 'unknown model error',
      };
    }
    default:
      return { kind: 'other' };
  }
}
