import net from 'net';
import { ProtocolError } from '../errors';
import { log } from '../log';
import type { PbxEventSink, PbxEventSource } from '../pbx/types';
import {
  AmiFrameParser,
  isResponse,
  isSuccess,
  serializeAction,
  type AmiAction,
  type AmiMessage,
} from './amiProtocol';

const RECONNECT_BASE_MS = 500;
const RECONNECT_MAX_MS = 10_000;

export interface AmiClientOptions {
  host: string;
  port: number;
  username: string;
  password: string;
  /** How long to wait for the response to an action. */
  timeoutMs: number;
}

interface PendingAction {
  action: string;
  resolve: (message: AmiMessage) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Manager interface connection. Responses are matched to actions by
 * `ActionID`; everything else is an event and goes to the sink.
 */
export class AmiClient implements PbxEventSource {
  private socket?: net.Socket;
  private sink?: PbxEventSink;
  private readonly parser = new AmiFrameParser();
  private readonly pending = new Map<string, PendingAction>();
  private nextActionId = 0;
  private stopped = true;
  private loggedIn = false;
  private reconnectAttempt = 0;
  private reconnectTimer?: NodeJS.Timeout;

  constructor(private readonly options: AmiClientOptions) {}

  public get connected(): boolean {
    return this.loggedIn;
  }

  public async start(sink: PbxEventSink): Promise<void> {
    this.sink = sink;
    this.stopped = false;
    await this.connect();
  }

  public async stop(): Promise<void> {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }

    const socket = this.socket;
    if (!socket) {
      return;
    }

    if (this.loggedIn) {
      try {
        await this.send({ Action: 'Logoff' });
      } catch (error) {
        log.debug({ err: error, event: 'ami_logoff_failed' }, 'ami logoff failed');
      }
    }

    await new Promise<void>((resolve) => {
      if (socket.destroyed) {
        resolve();
        return;
      }
      socket.once('close', () => resolve());
      socket.end();
    });
  }

  /** Sends an action and resolves with its response; an `Error` response rejects. */
  public send(action: AmiAction): Promise<AmiMessage> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      return Promise.reject(new ProtocolError(`AMI not connected, cannot send ${action.Action}`));
    }

    const actionId =
      typeof action.ActionID === 'string' && action.ActionID !== ''
        ? action.ActionID
        : `ami-${(this.nextActionId += 1)}`;
    if (this.pending.has(actionId)) {
      return Promise.reject(new ProtocolError(`AMI action id ${actionId} is already in flight`));
    }

    return new Promise<AmiMessage>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.pending.delete(actionId)) {
          reject(new ProtocolError(`AMI ${action.Action} got no response within ${this.options.timeoutMs}ms`));
        }
      }, this.options.timeoutMs);

      this.pending.set(actionId, { action: action.Action, resolve, reject, timer });
      log.debug({ event: 'ami_action', action: action.Action, action_id: actionId }, 'ami action');
      socket.write(serializeAction({ ...action, ActionID: actionId }));
    });
  }

  private connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.parser.reset();
      this.loggedIn = false;
      const socket = net.createConnection({ host: this.options.host, port: this.options.port });
      socket.setEncoding('utf8');
      this.socket = socket;
      let settled = false;

      socket.on('connect', () => {
        this.send({ Action: 'Login', Username: this.options.username, Secret: this.options.password, Events: 'on' })
          .then(() => {
            this.loggedIn = true;
            this.reconnectAttempt = 0;
            settled = true;
            log.info(
              { event: 'ami_connected', host: this.options.host, port: this.options.port, banner: this.parser.banner },
              'ami connected',
            );
            resolve();
          })
          .catch((error: unknown) => {
            settled = true;
            socket.destroy();
            reject(new ProtocolError('AMI login failed', { cause: error }));
          });
      });

      socket.on('data', (chunk: string) => {
        for (const message of this.parser.push(chunk)) {
          this.dispatch(message);
        }
      });

      socket.on('error', (error) => {
        log.error({ err: error, event: 'ami_socket_error' }, 'ami socket error');
        if (!settled) {
          settled = true;
          reject(new ProtocolError('AMI connection failed', { cause: error }));
        }
      });

      socket.on('close', () => {
        const wasLoggedIn = this.loggedIn;
        this.loggedIn = false;
        if (this.socket === socket) {
          this.socket = undefined;
        }
        this.failPending(new ProtocolError('AMI connection closed'));

        if (this.stopped || !wasLoggedIn) {
          return;
        }
        log.warn({ event: 'ami_closed' }, 'ami connection closed');
        this.sink?.onTransportError('ami', new ProtocolError('AMI connection closed'));
        this.scheduleReconnect();
      });
    });
  }

  private dispatch(message: AmiMessage): void {
    const actionId = message.ActionID;
    if (isResponse(message)) {
      const pending = actionId !== undefined ? this.pending.get(actionId) : undefined;
      if (!pending || actionId === undefined) {
        log.debug({ event: 'ami_response_unmatched', action_id: actionId }, 'ami response without pending action');
        return;
      }
      this.pending.delete(actionId);
      clearTimeout(pending.timer);
      if (isSuccess(message)) {
        pending.resolve(message);
      } else {
        pending.reject(
          new ProtocolError(`AMI ${pending.action} failed: ${message.Message ?? message.Response}`, {
            responseBody: message,
          }),
        );
      }
      return;
    }

    if (message.Event !== undefined) {
      this.sink?.onEvent({ source: 'ami', raw: message });
    }
  }

  private failPending(error: Error): void {
    for (const [actionId, pending] of this.pending.entries()) {
      clearTimeout(pending.timer);
      this.pending.delete(actionId);
      pending.reject(error);
    }
  }

  private scheduleReconnect(): void {
    if (this.stopped) {
      return;
    }
    const waitMs = Math.min(RECONNECT_MAX_MS, RECONNECT_BASE_MS * Math.pow(2, this.reconnectAttempt));
    this.reconnectAttempt += 1;
    log.info({ event: 'ami_reconnect', wait_ms: waitMs, attempt: this.reconnectAttempt }, 'ami reconnecting');

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.connect().catch((error: unknown) => {
        log.warn({ err: error, event: 'ami_reconnect_failed' }, 'ami reconnect failed');
        this.scheduleReconnect();
      });
    }, waitMs);
  }
}
