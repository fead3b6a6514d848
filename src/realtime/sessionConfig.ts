import type { AudioFormat, RealtimeVoice, RelayConfig } from '../config';

export interface ServerVadTurnDetection {
  type: 'server_vad';
  mode: string;
  time_units: {
    speech_gap_ms: number;
    speech_timeout_ms: number;
  };
}

export interface SessionUpdate {
  type: 'session.update';
  session: {
    turn_detection: ServerVadTurnDetection | null;
    input_audio_format: AudioFormat;
    output_audio_format: AudioFormat;
    voice: RealtimeVoice;
    instructions: string;
    modalities: Array<'text' | 'audio'>;
    temperature: number;
  };
}

export function buildSessionUpdate(config: RelayConfig, instructions: string): SessionUpdate {
  const { turnDetection } = config;
  return {
    type: 'session.update',
    session: {
      turn_detection:
        turnDetection.type === 'server_vad'
          ? {
              type: 'server_vad',
              mode: turnDetection.mode,
              time_units: {
                speech_gap_ms: turnDetection.speechGapMs,
                speech_timeout_ms: turnDetection.speechTimeoutMs,
              },
            }
          : null,
      input_audio_format: config.audioFormat,
      output_audio_format: config.audioFormat,
      voice: config.voice,
      instructions,
      modalities: ['text', 'audio'],
      temperature: config.temperature,
    },
  };
}
