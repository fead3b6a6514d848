import type { Env } from './env';

export type RealtimeVoice = Env['RELAY_VOICE'];
export type AudioFormat = Env['AUDIO_FORMAT'];
export type TurnDetectionType = Env['TURN_DETECTION'];

export interface TurnDetectionConfig {
  type: TurnDetectionType;
  mode: string;
  speechGapMs: number;
  speechTimeoutMs: number;
}

export interface ModelConnectionConfig {
  url: string;
  model: string;
  apiKey: string;
}

/**
 * Static per-process settings for the relay. Persona variants (voice, greeting,
 * turn detection) are plain settings.
 */
export interface RelayConfig {
  model: ModelConnectionConfig;
  voice: RealtimeVoice;
  greetingText: string;
  greetingFollowupText: string;
  greetingVoice: string;
  turnDetection: TurnDetectionConfig;
  audioFormat: AudioFormat;
  temperature: number;
  callLogDir: string;
  callLogLevel: Env['CALL_LOG_LEVEL'];
  promptsPath: string;
  publicBaseUrl?: string;
}

export function buildRelayConfig(source: Env): RelayConfig {
  return {
    model: {
      url: source.OPENAI_REALTIME_URL,
      model: source.OPENAI_REALTIME_MODEL,
      apiKey: source.OPENAI_API_KEY,
    },
    voice: source.RELAY_VOICE,
    greetingText: source.GREETING_TEXT,
    greetingFollowupText: source.GREETING_FOLLOWUP_TEXT,
    greetingVoice: source.GREETING_VOICE,
    turnDetection: {
      type: source.TURN_DETECTION,
      mode: source.TURN_DETECTION_MODE,
      speechGapMs: source.SPEECH_GAP_MS,
      speechTimeoutMs: source.SPEECH_TIMEOUT_MS,
    },
    audioFormat: source.AUDIO_FORMAT,
    temperature: source.MODEL_TEMPERATURE,
    callLogDir: source.CALL_LOG_DIR,
    callLogLevel: source.CALL_LOG_LEVEL,
    promptsPath: source.PROMPTS_PATH,
    publicBaseUrl: source.PUBLIC_BASE_URL,
  };
}

export function buildModelSocketUrl(config: ModelConnectionConfig): string {
  const url = new URL(config.url);
  url.searchParams.set('model', config.model);
  return url.toString();
}
