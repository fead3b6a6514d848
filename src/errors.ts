export class MalformedAudioError extends Error {
  constructor(detail: string) {
    super(`malformed audio payload: ${detail}`);
    this.name = 'MalformedAudioError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
