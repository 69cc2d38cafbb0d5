import WebSocket from 'ws';
import { ProtocolError } from '../errors';
import { log } from '../log';
import type { PbxEventSink, PbxEventSource } from '../pbx/types';

const RECONNECT_BASE_MS = 500;
const RECONNECT_MAX_MS = 10_000;

export interface AriEventStreamOptions {
  host: string;
  port: number;
  username: string;
  password: string;
  app: string;
  secure?: boolean;
}

export function buildEventsUrl(options: AriEventStreamOptions): string {
  const scheme = options.secure ? 'wss' : 'ws';
  const url = new URL(`${scheme}://${options.host}:${options.port}/ari/events`);
  url.searchParams.set('app', options.app);
  url.searchParams.set('api_key', `${options.username}:${options.password}`);
  // Text messages are only delivered to apps subscribed to everything.
  url.searchParams.set('subscribeAll', 'true');
  return url.toString();
}

/** Decodes one websocket frame; undefined when it is not a JSON object. */
export function parseAriMessage(data: WebSocket.RawData): unknown {
  const text = Buffer.isBuffer(data)
    ? data.toString('utf8')
    : Array.isArray(data)
      ? Buffer.concat(data).toString('utf8')
      : Buffer.from(data).toString('utf8');

  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === 'object' && parsed !== null ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Long-lived ARI event websocket. Reconnects with backoff; every lost
 * connection is reported to the sink since in-flight playbacks and
 * recordings can no longer be observed.
 */
export class AriEventStream implements PbxEventSource {
  private socket?: WebSocket;
  private sink?: PbxEventSink;
  private stopped = true;
  private reconnectAttempt = 0;
  private reconnectTimer?: NodeJS.Timeout;

  constructor(private readonly options: AriEventStreamOptions) {}

  public start(sink: PbxEventSink): Promise<void> {
    this.sink = sink;
    this.stopped = false;
    return this.connect();
  }

  public async stop(): Promise<void> {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    const socket = this.socket;
    this.socket = undefined;
    if (socket && socket.readyState !== WebSocket.CLOSED) {
      await new Promise<void>((resolve) => {
        socket.once('close', () => resolve());
        socket.close(1000, 'shutdown');
      });
    }
  }

  private connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(buildEventsUrl(this.options));
      this.socket = socket;
      let opened = false;

      socket.on('open', () => {
        opened = true;
        this.reconnectAttempt = 0;
        log.info({ event: 'ari_events_connected', app: this.options.app }, 'ari event stream connected');
        resolve();
      });

      socket.on('message', (data) => {
        const raw = parseAriMessage(data);
        if (raw === undefined) {
          log.warn({ event: 'ari_events_unparseable' }, 'ari event frame was not json');
          return;
        }
        this.sink?.onEvent({ source: 'ari', raw });
      });

      socket.on('error', (error) => {
        log.error({ err: error, event: 'ari_events_error' }, 'ari event stream error');
        if (!opened) {
          reject(new ProtocolError('ARI event stream connection failed', { cause: error }));
        }
      });

      socket.on('close', (code, reason) => {
        if (this.socket === socket) {
          this.socket = undefined;
        }
        if (!opened || this.stopped) {
          return;
        }
        log.warn(
          { event: 'ari_events_closed', code, reason: reason.toString('utf8') },
          'ari event stream closed',
        );
        this.sink?.onTransportError('ari', new ProtocolError(`ARI event stream closed (${code})`));
        this.scheduleReconnect();
      });
    });
  }

  private scheduleReconnect(): void {
    if (this.stopped) {
      return;
    }
    const waitMs = Math.min(RECONNECT_MAX_MS, RECONNECT_BASE_MS * Math.pow(2, this.reconnectAttempt));
    this.reconnectAttempt += 1;
    log.info({ event: 'ari_events_reconnect', wait_ms: waitMs, attempt: this.reconnectAttempt }, 'ari event stream reconnecting');

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.connect().catch((error: unknown) => {
        log.warn({ err: error, event: 'ari_events_reconnect_failed' }, 'ari event stream reconnect failed');
        this.scheduleReconnect();
      });
    }, waitMs);
  }
}
