import { MalformedAudioError } from '../errors';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** Strict base64 decode; Buffer.from silently skips invalid characters. */
export function decodeAudioPayload(payload: string): Buffer {
  if (payload.length === 0) {
    throw new MalformedAudioError('empty payload');
  }
  if (!BASE64_PATTERN.test(payload)) {
    throw new MalformedAudioError(`invalid base64 (length ${payload.length})`);
  }
  return Buffer.from(payload, 'base64');
}

export function encodeAudioPayload(audio: Buffer): string {
  return audio.toString('base64');
}

/**
 * Validates a model audio delta and re-encodes it for the telephony side. The
 * audio bytes are opaque and pass through unchanged.
 */
export function relayAudioPayload(payload: string): string {
  return encodeAudioPayload(decodeAudioPayload(payload));
}
