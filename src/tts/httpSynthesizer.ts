import { ProtocolError } from '../errors';
import { log } from '../log';
import type { Synthesizer, TTSRequest, TTSResult } from './types';

/**
 * Synthesizer backed by an HTTP TTS service that takes `{ text, voice }`
 * as JSON and answers with audio bytes.
 */
export function createHttpSynthesizer(url: string, fetchImpl: typeof fetch = fetch): Synthesizer {
  return async (request: TTSRequest): Promise<TTSResult> => {
    const startedAt = Date.now();
    const response = await fetchImpl(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        text: request.text,
        voice: request.voice,
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      log.error({ event: 'tts_request_failed', status: response.status, body }, 'tts error');
      throw new ProtocolError(`tts error ${response.status}`, { status: response.status, responseBody: body });
    }

    const arrayBuffer = await response.arrayBuffer();
    log.debug(
      { event: 'tts_synthesized', text_length: request.text.length, duration_ms: Date.now() - startedAt },
      'tts synthesized',
    );
    return {
      audio: Buffer.from(arrayBuffer),
      contentType: response.headers.get('content-type') ?? 'audio/wav',
    };
  };
}
