import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { ConfigurationError } from '../errors';
import { log } from '../log';
import type { SpeechResolver, Synthesizer } from './types';

const MAX_NAME_LENGTH = 200;
const DEFAULT_VOICE_LABEL = 'default';

const EXTENSION_BY_CONTENT_TYPE: Record<string, string> = {
  'audio/wav': 'wav',
  'audio/x-wav': 'wav',
  'audio/wave': 'wav',
  'audio/l16': 'sln',
  'audio/basic': 'ulaw',
  'audio/gsm': 'gsm',
};

/** Text and voice as a file name: lowercase, dashes for spaces, punctuation dropped. */
export function cleanSpeechName(text: string, voice?: string): string {
  const cleaned = `${text}-${voice ?? DEFAULT_VOICE_LABEL}`
    .toLowerCase()
    .replace(/\s+/g, '-')
    .replace(/[^a-z0-9_-]/g, '')
    .replace(/-{2,}/g, '-')
    .replace(/^-+/, '');
  return cleaned;
}

export function extensionFor(contentType: string): string {
  const base = contentType.split(';')[0].trim().toLowerCase();
  return EXTENSION_BY_CONTENT_TYPE[base] ?? 'wav';
}

export interface CachedSpeechResolverOptions {
  soundsDir: string;
  subdir: string;
  synthesizer: Synthesizer;
  defaultVoice?: string;
}

/**
 * Synthesizes text once and keeps the audio under the Asterisk sounds
 * directory, so later prompts play straight from disk.
 */
export class CachedSpeechResolver implements SpeechResolver {
  private readonly cache = new Map<string, string>();
  private readonly inFlight = new Map<string, Promise<string>>();
  private readonly directory: string;

  constructor(private readonly options: CachedSpeechResolverOptions) {
    this.directory = path.join(options.soundsDir, options.subdir);
  }

  public async resolve(text: string, voice?: string): Promise<string> {
    const effectiveVoice = voice ?? this.options.defaultVoice;
    const key = cleanSpeechName(text, effectiveVoice);

    const cachedFile = this.cache.get(key);
    if (cachedFile && (await this.exists(cachedFile))) {
      log.debug({ event: 'tts_cache_hit', name: key }, 'tts cache hit');
      return this.mediaUri(cachedFile);
    }

    const running = this.inFlight.get(key);
    if (running) {
      return running;
    }

    const task = this.synthesizeAndStore(key, text, effectiveVoice).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, task);
    return task;
  }

  private async synthesizeAndStore(key: string, text: string, voice?: string): Promise<string> {
    const result = await this.options.synthesizer({ text, voice });
    const baseName = key.length > MAX_NAME_LENGTH || key === '' ? randomUUID().replace(/-/g, '') : key;
    const fileName = `${baseName}.${extensionFor(result.contentType)}`;

    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(path.join(this.directory, fileName), result.audio);
    this.cache.set(key, fileName);

    log.info(
      { event: 'tts_cached', file_name: fileName, bytes: result.audio.length, content_type: result.contentType },
      'tts audio cached',
    );
    return this.mediaUri(fileName);
  }

  private async exists(fileName: string): Promise<boolean> {
    try {
      await fs.access(path.join(this.directory, fileName));
      return true;
    } catch {
      return false;
    }
  }

  // Asterisk picks the format itself, so the extension is left off.
  private mediaUri(fileName: string): string {
    const name = fileName.slice(0, fileName.length - path.extname(fileName).length);
    return `sound:${this.options.subdir}/${name}`;
  }
}

/** Stand-in used when no TTS service is configured. */
export class UnconfiguredSpeechResolver implements SpeechResolver {
  public async resolve(text: string): Promise<string> {
    throw new ConfigurationError(`cannot speak "${text.slice(0, 40)}": TTS_URL is not configured`);
  }
}
