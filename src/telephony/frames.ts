import { z } from 'zod';

const StartFrameSchema = z
  .object({
    event: z.literal('start'),
    start: z
      .object({
        streamSid: z.string().min(1),
        callSid: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

const MediaFrameSchema = z
  .object({
    event: z.literal('media'),
    streamSid: z.string().optional(),
    media: z
      .object({
        payload: z.string(),
        track: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

const StopFrameSchema = z
  .object({
    event: z.literal('stop'),
    streamSid: z.string().optional(),
  })
  .passthrough();

const TaggedFrameSchema = z.object({ event: z.string() }).passthrough();

export type StartFrame = z.infer<typeof StartFrameSchema>;
export type MediaFrame = z.infer<typeof MediaFrameSchema>;
export type StopFrame = z.infer<typeof StopFrameSchema>;

export type InboundTelephonyFrame =
  | { kind: 'start'; streamId: string; raw: StartFrame }
  | { kind: 'media'; payload: string }
  | { kind: 'stop' }
  | { kind: 'unknown'; event: string };

export interface OutboundMediaFrame {
  event: 'media';
  streamSid: string;
  media: { payload: string };
}

export type FrameParseResult =
  | { ok: true; frame: InboundTelephonyFrame }
  | { ok: false; reason: 'invalid_json' | 'invalid_frame'; detail: string };

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; detail: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, detail: error instanceof Error ? error.message : String(error) };
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
}

export function parseTelephonyFrame(text: string): FrameParseResult {
  const json = parseJson(text);
  if (!json.ok) {
    return { ok: false, reason: 'invalid_json', detail: json.detail };
  }

  const tagged = TaggedFrameSchema.safeParse(json.value);
  if (!tagged.success) {
    return { ok: false, reason: 'invalid_frame', detail: describeIssues(tagged.error) };
  }

  switch (tagged.data.event) {
    case 'start': {
      const start = StartFrameSchema.safeParse(json.value);
      if (!start.success) {
        return { ok: false, reason: 'invalid_frame', detail: describeIssues(start.error) };
      }
      return { ok: true, frame: { kind: 'start', streamId: start.data.start.streamSid, raw: start.data } };
    }
    case 'media': {
      const media = MediaFrameSchema.safeParse(json.value);
      if (!media.success) {
        return { ok: false, reason: 'invalid_frame', detail: describeIssues(media.error) };
      }
      return { ok: true, frame: { kind: 'media', payload: media.data.media.payload } };
    }
    case 'stop': {
      const stop = StopFrameSchema.safeParse(json.value);
      if (!stop.success) {
        return { ok: false, reason: 'invalid_frame', detail: describeIssues(stop.error) };
      }
      return { ok: true, frame: { kind: 'stop' } };
    }
    default:
      return { ok: true, frame: { kind: 'unknown', event: tagged.data.event } };
  }
}

export function buildOutboundMedia(streamSid: string, payload: string): OutboundMediaFrame {
  return { event: 'media', streamSid, media: { payload } };
}
