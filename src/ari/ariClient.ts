import { ProtocolError } from '../errors';
import { log } from '../log';
import type { PlaybackControl, PlayRequest, RecordRequest } from '../pbx/types';

const ARI_MAX_RETRIES = 2;

// Retry backoff tuning (keep small; call control is latency-sensitive)
const ARI_RETRY_BASE_MS = 250;
const ARI_RETRY_MAX_MS = 1500;

export interface AriClientOptions {
  host: string;
  port: number;
  username: string;
  password: string;
  app: string;
  secure?: boolean;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

type QueryValue = string | number | boolean | undefined;

interface AriRequest {
  method: 'GET' | 'POST' | 'DELETE';
  path: string;
  query?: Record<string, QueryValue>;
  /** Resource the request acts on; a 404 then means it is already gone. */
  target?: string;
}

function shouldRetry(status: number): boolean {
  return status === 429 || status >= 500;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function backoffMs(attempt: number): number {
  const exp = Math.min(ARI_RETRY_MAX_MS, ARI_RETRY_BASE_MS * Math.pow(2, attempt));
  const jitter = Math.floor(Math.random() * 120);
  return exp + jitter;
}

function truncateForLog(value: unknown, max = 800): string {
  try {
    const s = typeof value === 'string' ? value : JSON.stringify(value);
    if (s.length <= max) return s;
    return `${s.slice(0, max)}…(truncated)`;
  } catch {
    return '[unserializable]';
  }
}

async function safeReadBody(response: Response): Promise<unknown> {
  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('application/json')) {
    try {
      return await response.json();
    } catch {
      // fall through to text
    }
  }
  try {
    return await response.text();
  } catch (e) {
    return `<<failed to read response body: ${String(e)}>>`;
  }
}

function isAbortError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === 'AbortError' || /aborted|AbortError/i.test(err.message))
  );
}

/**
 * REST side of the Asterisk REST Interface: channel and playback control.
 * Events arrive separately over the ARI websocket (see ariEvents).
 */
export class AriClient {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: AriClientOptions) {
    const scheme = options.secure ? 'https' : 'http';
    this.baseUrl = `${scheme}://${options.host}:${options.port}/ari`;
    this.authorization = `Basic ${Buffer.from(`${options.username}:${options.password}`).toString('base64')}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  public get app(): string {
    return this.options.app;
  }

  public buildUrl(path: string, query: Record<string, QueryValue> = {}): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  public async answer(channelId: string): Promise<void> {
    await this.request({ method: 'POST', path: `/channels/${encodeURIComponent(channelId)}/answer`, target: channelId });
  }

  public async play(channelId: string, request: PlayRequest): Promise<void> {
    await this.request({
      method: 'POST',
      path: `/channels/${encodeURIComponent(channelId)}/play/${encodeURIComponent(request.playbackId)}`,
      query: { media: request.media },
      target: channelId,
    });
  }

  public async stopPlayback(playbackId: string): Promise<void> {
    await this.request({
      method: 'DELETE',
      path: `/playbacks/${encodeURIComponent(playbackId)}`,
      target: playbackId,
    });
  }

  public async controlPlayback(playbackId: string, operation: PlaybackControl): Promise<void> {
    await this.request({
      method: 'POST',
      path: `/playbacks/${encodeURIComponent(playbackId)}/control`,
      query: { operation },
      target: playbackId,
    });
  }

  public async record(channelId: string, request: RecordRequest): Promise<void> {
    await this.request({
      method: 'POST',
      path: `/channels/${encodeURIComponent(channelId)}/record`,
      query: {
        name: request.name,
        format: request.format,
        maxDurationSeconds: request.maxDurationSec,
        maxSilenceSeconds: request.maxSilenceSec,
        beep: request.beep,
        terminateOn: request.terminateOn,
        ifExists: 'overwrite',
      },
      target: channelId,
    });
  }

  public async hangup(channelId: string): Promise<void> {
    await this.request({
      method: 'DELETE',
      path: `/channels/${encodeURIComponent(channelId)}`,
      query: { reason: 'normal' },
      target: channelId,
    });
  }

  public async request(request: AriRequest, attempt = 0): Promise<unknown> {
    const url = this.buildUrl(request.path, request.query);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const startedAt = Date.now();
    const logContext = { method: request.method, path: request.path, attempt };

    log.debug({ event: 'ari_request', ...logContext }, 'ari request');

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: request.method,
          headers: {
            Authorization: this.authorization,
            Accept: 'application/json',
          },
          signal: controller.signal,
        });
      } catch (error) {
        // Abort means ARI is slow or the timeout is too low; retrying only piles on.
        if (!isAbortError(error) && attempt < ARI_MAX_RETRIES) {
          const waitMs = backoffMs(attempt);
          log.warn({ event: 'ari_request_error_retry', wait_ms: waitMs, err: error, ...logContext }, 'ari request error retry');
          await sleep(waitMs);
          return this.request(request, attempt + 1);
        }
        log.error({ event: 'ari_request_error', err: error, ...logContext }, 'ari request error');
        throw new ProtocolError(`ARI ${request.method} ${request.path} failed: ${String(error)}`, { cause: error });
      }

      const body = await safeReadBody(response);
      const durationMs = Date.now() - startedAt;

      if (response.ok) {
        log.debug(
          { event: 'ari_request_completed', status: response.status, duration_ms: durationMs, ...logContext },
          'ari request completed',
        );
        return body;
      }

      const logBody = truncateForLog(body, 1000);

      if (response.status === 404 && request.target) {
        log.warn(
          {
            event: 'ari_request_ignored_post_end',
            target: request.target,
            status: response.status,
            duration_ms: durationMs,
            body: logBody,
            ...logContext,
          },
          'ari request ignored, resource already gone',
        );
        return undefined;
      }

      if (shouldRetry(response.status) && attempt < ARI_MAX_RETRIES) {
        const waitMs = backoffMs(attempt);
        log.warn(
          {
            event: 'ari_request_retry',
            status: response.status,
            duration_ms: durationMs,
            wait_ms: waitMs,
            body: logBody,
            ...logContext,
          },
          'ari request retry',
        );
        await sleep(waitMs);
        return this.request(request, attempt + 1);
      }

      log.error(
        { event: 'ari_request_failed', status: response.status, duration_ms: durationMs, body: logBody, ...logContext },
        'ari request failed',
      );
      throw new ProtocolError(`ARI ${request.method} ${request.path} failed: ${response.status} ${logBody}`, {
        status: response.status,
        responseBody: body,
      });
    } finally {
      clearTimeout(timer);
    }
  }
}
