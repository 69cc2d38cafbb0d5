import { randomUUID } from 'crypto';
import type { RuntimeConfig } from '../config';
import type { Session } from '../calls/session';
import type { SessionRegistry } from '../calls/sessionRegistry';
import type { TextSession, VoiceSession } from '../calls/types';
import { OriginationError } from '../errors';
import { conversationId, extractNumber, type EventNormalizer } from '../events/normalizer';
import { log } from '../log';

const DIALABLE_NUMBER = /^\+?\d{3,15}$/;

export interface OriginateOptions {
  callerIdNumber?: string;
  callerIdName?: string;
}

export interface OutboundInitiatorDeps {
  config: RuntimeConfig;
  registry: SessionRegistry;
  normalizer: EventNormalizer;
}

/**
 * Starts calls and text conversations on demand. The session is created in
 * CREATED, becomes ACTIVE only after the PBX reports a successful originate,
 * and then runs the caller's logic like any inbound session.
 */
export class OutboundInitiator {
  constructor(private readonly deps: OutboundInitiatorDeps) {}

  public async originateCall<R>(
    target: string,
    logic: (session: VoiceSession) => Promise<R>,
    options: OriginateOptions = {},
  ): Promise<R> {
    const callerId = this.callerId(options);
    const dialTarget = target.trim();
    if (dialTarget === '') {
      throw new OriginationError(target, 'empty target');
    }

    const sessionId = randomUUID();
    const { session } = this.deps.registry.getOrCreate(
      {
        id: sessionId,
        kind: 'voice',
        remoteNumber: dialTarget.includes('/') ? undefined : extractNumber(dialTarget),
        localNumber: callerId.number,
      },
      { requestId: sessionId, destination: dialTarget },
    );

    await this.originate(session, dialTarget, callerId);
    return session.run(() => logic(session.asVoice()));
  }

  public async originateText<R>(
    target: string,
    logic: (session: TextSession) => Promise<R>,
    options: OriginateOptions = {},
  ): Promise<R> {
    const callerId = this.callerId(options);
    const remote = extractNumber(target);
    if (!DIALABLE_NUMBER.test(remote)) {
      throw new OriginationError(target, 'not a phone number');
    }

    const sessionId = conversationId(callerId.number, remote);
    const { session, created } = this.deps.registry.getOrCreate(
      { id: sessionId, kind: 'text', remoteNumber: remote, localNumber: callerId.number },
      { requestId: randomUUID(), destination: remote },
    );
    if (!created) {
      throw new OriginationError(target, 'a conversation with this number is already active');
    }

    const pending = this.originate(session, remote, callerId);
    // Texting needs no call setup: report success right away through the normal event path.
    this.deps.registry.route(
      this.deps.normalizer.stamp(
        { channelId: sessionId, kind: 'originate_result', payload: { success: true } },
        'runtime',
      ),
    );
    await pending;
    return session.run(() => logic(session.asText()));
  }

  private async originate(
    session: Session,
    target: string,
    callerId: { number: string; name: string },
  ): Promise<void> {
    const startedAt = Date.now();
    log.info(
      { event: 'originate_started', session_id: session.id, session_kind: session.kind, target },
      'originate started',
    );

    try {
      await session.originate({ target, callerIdNumber: callerId.number, callerIdName: callerId.name });
    } catch (error) {
      log.warn(
        {
          err: error,
          event: 'originate_failed',
          session_id: session.id,
          session_kind: session.kind,
          target,
          duration_ms: Date.now() - startedAt,
        },
        'originate failed',
      );
      throw error;
    }

    log.info(
      {
        event: 'originate_succeeded',
        session_id: session.id,
        session_kind: session.kind,
        target,
        duration_ms: Date.now() - startedAt,
      },
      'originate succeeded',
    );
  }

  private callerId(options: OriginateOptions): { number: string; name: string } {
    const identity = this.deps.config.identity;
    let number = options.callerIdNumber ?? identity.phoneNumber;
    if (!DIALABLE_NUMBER.test(number)) {
      log.warn(
        { event: 'originate_caller_id_replaced', caller_id_number: number },
        'caller id number is not dialable, using the system number',
      );
      number = identity.phoneNumber;
    }
    return { number, name: options.callerIdName ?? identity.name };
  }
}
