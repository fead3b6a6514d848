import { Request, Router } from 'express';
import type { RelayConfig } from '../config';
import { log } from '../log';

export const MEDIA_STREAM_PATH = '/media-stream';

export interface IncomingCallTwimlOptions {
  greetingText: string;
  followupText: string;
  voice: string;
  streamUrl: string;
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

export function buildMediaStreamUrl(host: string, publicBaseUrl?: string): string {
  if (!publicBaseUrl) {
    return `wss://${host}${MEDIA_STREAM_PATH}`;
  }

  const trimmedBase = publicBaseUrl.replace(/\/$/, '');
  let wsBase = trimmedBase;
  if (trimmedBase.startsWith('https://')) {
    wsBase = `wss://${trimmedBase.slice('https://'.length)}`;
  } else if (trimmedBase.startsWith('http://')) {
    wsBase = `ws://${trimmedBase.slice('http://'.length)}`;
  } else if (!trimmedBase.startsWith('ws://') && !trimmedBase.startsWith('wss://')) {
    wsBase = `wss://${trimmedBase}`;
  }
  return `${wsBase}${MEDIA_STREAM_PATH}`;
}

/** Greets the caller, then hands the call to the relay's media stream. */
export function buildIncomingCallTwiml(options: IncomingCallTwimlOptions): string {
  const voice = escapeXml(options.voice);
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<Response>',
    `<Say voice="${voice}">${escapeXml(options.greetingText)}</Say>`,
    '<Pause length="1"/>',
    `<Say voice="${voice}">${escapeXml(options.followupText)}</Say>`,
    '<Connect>',
    `<Stream url="${escapeXml(options.streamUrl)}"/>`,
    '</Connect>',
    '</Response>',
  ].join('');
}

export function createIncomingCallRouter(config: RelayConfig): Router {
  const router = Router();

  router.all('/', (req: Request, res) => {
    const streamUrl = buildMediaStreamUrl(req.hostname, config.publicBaseUrl);
    log.info(
      { event: 'incoming_call', method: req.method, stream_url: streamUrl, call_sid: req.body?.CallSid },
      'incoming call answered',
    );

    res
      .status(200)
      .type('application/xml')
      .send(
        buildIncomingCallTwiml({
          greetingText: config.greetingText,
          followupText: config.greetingFollowupText,
          voice: config.greetingVoice,
          streamUrl,
        }),
      );
  });

  return router;
}
