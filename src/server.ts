import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { RuntimeConfig } from './config';
import { SessionRegistry } from './calls/sessionRegistry';
import type { Session, SessionSettings } from './calls/session';
import type { CallHandler, SessionKind, TextHandler } from './calls/types';
import { ConfigurationError, isChannelGone } from './errors';
import { EventNormalizer } from './events/normalizer';
import type { PbxEvent, PbxEventOf, RawPbxEvent } from './events/types';
import { CapacityLimiter } from './limits/capacity';
import { log } from './log';
import { incPbxEventDropped } from './metrics';
import type { PbxCommands, PbxEventSource } from './pbx/types';
import type { SpeechResolver } from './tts/types';

export const UNAVAILABLE_TEXT_REPLY = 'Sorry, this number cannot take messages right now.';

export interface ExtensionRegistration {
  readonly number: string;
  readonly callHandler?: CallHandler;
  readonly textHandler?: TextHandler;
}

const RegistrationSchema = z
  .object({
    number: z
      .string()
      .trim()
      .regex(/^\+?\d{1,15}$/, 'expected digits with an optional leading +'),
    callHandler: z.custom<CallHandler>((value) => typeof value === 'function', 'expected a function').optional(),
    textHandler: z.custom<TextHandler>((value) => typeof value === 'function', 'expected a function').optional(),
  })
  .refine((value) => value.callHandler !== undefined || value.textHandler !== undefined, {
    message: 'at least one of callHandler or textHandler is required',
  });

export type PbxGateway = PbxCommands & PbxEventSource;

export interface DialogServerDeps {
  config: RuntimeConfig;
  gateway: PbxGateway;
  speech: SpeechResolver;
  normalizer?: EventNormalizer;
  capacity?: CapacityLimiter;
  sweepIntervalMs?: number;
}

export function sessionSettingsFrom(config: RuntimeConfig): SessionSettings {
  return {
    commandTimeoutMs: config.timeouts.commandMs,
    gatherTimeoutMs: config.timeouts.gatherMs,
    recordGraceMs: config.timeouts.recordGraceMs,
    originateTimeoutMs: config.timeouts.originateMs,
    menuMaxRetries: config.menu.maxRetries,
    menuRetryPrompt: config.menu.retryPrompt,
    voice: config.tts.voice,
  };
}

/**
 * Accepts inbound calls and texts for registered numbers and runs each one
 * as its own session with the number's handler.
 */
export class DialogServer {
  public readonly registry: SessionRegistry;
  public readonly normalizer: EventNormalizer;
  private readonly gateway: PbxGateway;
  private readonly capacity: CapacityLimiter;
  private readonly extensions = new Map<string, ExtensionRegistration>();
  private serving = false;
  private stopServing?: () => void;

  constructor(private readonly deps: DialogServerDeps) {
    this.gateway = deps.gateway;
    this.normalizer = deps.normalizer ?? new EventNormalizer();
    this.capacity = deps.capacity ?? new CapacityLimiter(deps.config.limits.maxConcurrentSessions);
    this.registry = new SessionRegistry(
      { commands: deps.gateway, speech: deps.speech, settings: sessionSettingsFrom(deps.config) },
      {
        endingGraceMs: deps.config.timeouts.endingGraceMs,
        sweepIntervalMs: deps.sweepIntervalMs,
        onSessionEnded: (session) => {
          if (session.kind === 'voice') {
            this.capacity.release({ sessionId: session.id, requestId: session.requestId });
          }
        },
      },
    );
  }

  public get isServing(): boolean {
    return this.serving;
  }

  public getRegistration(number: string): ExtensionRegistration | undefined {
    return this.extensions.get(number);
  }

  /**
   * Binds handlers to a number, replacing any earlier binding. While serving,
   * the dialplan entries are pushed to the PBX in the background.
   */
  public registerExtension(number: string, callHandler?: CallHandler, textHandler?: TextHandler): void {
    const parsed = RegistrationSchema.safeParse({ number, callHandler, textHandler });
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'registration'}: ${issue.message}`)
        .join(', ');
      throw new ConfigurationError(`Invalid extension registration: ${issues}`);
    }

    const registration: ExtensionRegistration = Object.freeze({
      number: parsed.data.number,
      callHandler: parsed.data.callHandler,
      textHandler: parsed.data.textHandler,
    });
    const replaced = this.extensions.has(registration.number);
    this.extensions.set(registration.number, registration);

    log.info(
      {
        event: 'extension_registered',
        number: registration.number,
        replaced,
        has_call_handler: registration.callHandler !== undefined,
        has_text_handler: registration.textHandler !== undefined,
      },
      'extension registered',
    );

    if (this.serving) {
      void this.pushExtension(registration);
    }
  }

  /** Starts the PBX feeds; resolves once `close()` has finished. */
  public async serveForever(): Promise<void> {
    if (this.serving) {
      throw new ConfigurationError('server is already serving');
    }

    const stopped = new Promise<void>((resolve) => {
      this.stopServing = resolve;
    });

    await this.gateway.start({
      onEvent: (raw) => this.onRawEvent(raw),
      onTransportError: (source, error) => this.onTransportError(source, error),
    });
    this.serving = true;
    log.info({ event: 'server_serving', extensions: this.extensions.size }, 'server serving');

    await Promise.all([...this.extensions.values()].map((registration) => this.pushExtension(registration)));
    await stopped;
  }

  public async close(): Promise<void> {
    if (!this.serving) {
      await this.registry.close();
      return;
    }
    this.serving = false;
    await this.registry.close();
    await this.gateway.stop();
    log.info({ event: 'server_closed' }, 'server closed');
    this.stopServing?.();
    this.stopServing = undefined;
  }

  /** Entry point for feed events; exposed so tests can drive the server. */
  public onRawEvent(raw: RawPbxEvent): void {
    const event = this.normalizer.normalize(raw);
    if (event) {
      this.dispatch(event);
    }
  }

  public dispatch(event: PbxEvent): void {
    switch (event.kind) {
      case 'offered':
        this.onOffered(event);
        return;
      case 'text_received':
        this.onTextReceived(event);
        return;
      default: {
        const outcome = this.registry.route(event);
        if (outcome === 'unknown') {
          incPbxEventDropped(event.source, 'unknown_session');
          log.debug(
            { event: 'pbx_event_unknown_session', channel_id: event.channelId, event_kind: event.kind },
            'event for unknown session dropped',
          );
        }
      }
    }
  }

  private onOffered(event: PbxEventOf<'offered'>): void {
    const { destination, caller } = event.payload;
    const requestId = randomUUID();
    const channelId = event.channelId;

    if (this.registry.has(channelId)) {
      this.registry.route(event);
      return;
    }
    // A repeated offer for a finished call must not run the handler again.
    if (this.registry.isEnded(channelId)) {
      incPbxEventDropped(event.source, 'session_ended');
      log.debug({ event: 'call_offer_after_end', channel_id: channelId, requestId }, 'offer for ended call dropped');
      return;
    }

    const handler = this.extensions.get(destination)?.callHandler;
    if (!handler) {
      this.decline(channelId, 'no_handler', { destination, requestId });
      return;
    }

    const admitted = this.capacity.tryAcquire({ sessionId: channelId, requestId });
    if (!admitted.ok) {
      this.decline(channelId, admitted.reason, { destination, requestId });
      return;
    }

    const { session } = this.registry.getOrCreate(
      { id: channelId, kind: 'voice', remoteNumber: caller, localNumber: destination },
      { requestId, destination },
    );
    this.launch(session, () => handler(session.asVoice()));
  }

  private onTextReceived(event: PbxEventOf<'text_received'>): void {
    const outcome = this.registry.route(event);
    if (outcome === 'delivered') {
      return;
    }

    const { from, to, body } = event.payload;
    const requestId = randomUUID();
    const handler = this.extensions.get(to)?.textHandler;
    if (!handler) {
      incPbxEventDropped(event.source, 'no_handler');
      log.warn({ event: 'text_no_handler', to, requestId }, 'no text handler for number');
      this.gateway.sendText({ to: from, from: to, body: UNAVAILABLE_TEXT_REPLY }).catch((error: unknown) => {
        log.warn({ err: error, event: 'text_unavailable_reply_failed', to: from, requestId }, 'unavailable reply failed');
      });
      return;
    }

    const { session } = this.registry.getOrCreate(
      { id: event.channelId, kind: 'text', remoteNumber: from, localNumber: to, initialMessage: body },
      { requestId, destination: to },
    );
    this.launch(session, () => handler(session.asText()));
  }

  private launch(session: Session, logic: () => Promise<void>): void {
    session.run(logic).catch((error: unknown) => {
      if (isChannelGone(error)) {
        log.info(
          { event: 'session_handler_channel_gone', session_id: session.id, reason: error.reason },
          'session handler stopped, channel gone',
        );
        return;
      }
      log.error(
        { err: error, event: 'session_handler_failed', session_id: session.id, session_kind: session.kind },
        'session handler failed',
      );
    });
  }

  private decline(
    channelId: string,
    reason: string,
    context: { destination: string; requestId: string },
  ): void {
    incPbxEventDropped('server', reason);
    log.warn(
      { event: 'call_declined', channel_id: channelId, reason, destination: context.destination, requestId: context.requestId },
      'inbound call declined',
    );
    this.gateway.hangup(channelId, reason).catch((error: unknown) => {
      log.warn({ err: error, event: 'call_decline_failed', channel_id: channelId }, 'declining call failed');
    });
  }

  /**
   * Fails the outstanding operation of every session that depended on the
   * lost feed. Idle sessions carry on; text sessions do not use ARI.
   */
  private onTransportError(source: RawPbxEvent['source'], error: Error): void {
    const sessions = this.registry
      .list()
      .filter((session) => session.hasPendingOperation() && !(source === 'ari' && session.kind === 'text'));
    log.error(
      { err: error, event: 'pbx_transport_lost', source, affected_sessions: sessions.length },
      'pbx transport lost',
    );
    for (const session of sessions) {
      const event = this.normalizer.stamp(
        { channelId: session.id, kind: 'error', payload: { message: error.message, cause: error } },
        'runtime',
      );
      this.registry.route(event);
    }
  }

  private async pushExtension(registration: ExtensionRegistration): Promise<void> {
    const kinds: SessionKind[] = ['voice', 'text'];
    for (const kind of kinds) {
      try {
        await this.gateway.registerExtension(registration.number, kind);
      } catch (error) {
        log.error(
          { err: error, event: 'extension_push_failed', number: registration.number, kind },
          'registering extension with pbx failed',
        );
      }
    }
  }
}
