import type { PbxEvent } from '../events/types';
import { log } from '../log';
import { incPbxEventDropped, incSessionsEnded, setSessionsActive } from '../metrics';
import { Session, type SessionDeps, type SessionInit } from './session';
import type { SessionId, SessionKind, SessionLogContext } from './types';

const DEFAULT_TOMBSTONE_TTL_MS = 10 * 60_000;
const DEFAULT_SWEEP_INTERVAL_MS = 15_000;

export type RouteOutcome = 'delivered' | 'ended' | 'unknown';

export interface SessionRegistryOptions {
  /** How long a session may sit in ENDING before it is finalized anyway. */
  endingGraceMs: number;
  tombstoneTtlMs?: number;
  sweepIntervalMs?: number;
  onSessionEnded?: (session: Session, reason: string) => void;
}

/**
 * Owns every live session by id. Ended ids are remembered for a while so
 * late events for them are dropped instead of starting a new session.
 */
export class SessionRegistry {
  private readonly sessions = new Map<SessionId, Session>();
  private readonly endedSessions = new Map<SessionId, number>();
  private readonly tombstoneTtlMs: number;
  private readonly endingGraceMs: number;
  private readonly sweepTimer: NodeJS.Timeout;
  private readonly onSessionEnded?: (session: Session, reason: string) => void;

  constructor(
    private readonly deps: SessionDeps,
    options: SessionRegistryOptions,
  ) {
    this.endingGraceMs = options.endingGraceMs;
    this.tombstoneTtlMs = options.tombstoneTtlMs ?? DEFAULT_TOMBSTONE_TTL_MS;
    this.onSessionEnded = options.onSessionEnded;

    const sweepInterval = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.sweepTimer = setInterval(() => this.sweep(), sweepInterval);
    this.sweepTimer.unref?.();
  }

  public lookup(sessionId: SessionId): Session | undefined {
    return this.sessions.get(sessionId);
  }

  public has(sessionId: SessionId): boolean {
    return this.sessions.has(sessionId);
  }

  public isEnded(sessionId: SessionId): boolean {
    return this.endedSessions.has(sessionId);
  }

  public get size(): number {
    return this.sessions.size;
  }

  public count(kind: SessionKind): number {
    let total = 0;
    for (const session of this.sessions.values()) {
      if (session.kind === kind) {
        total += 1;
      }
    }
    return total;
  }

  public list(): Session[] {
    return [...this.sessions.values()];
  }

  /**
   * Returns the live session for `init.id`, creating it when absent.
   * Runs synchronously, so two offers for one id can never both create.
   */
  public getOrCreate(
    init: SessionInit,
    context: SessionLogContext = {},
  ): { session: Session; created: boolean } {
    const existing = this.sessions.get(init.id);
    if (existing) {
      log.info(
        {
          event: 'session_exists',
          session_id: existing.id,
          session_kind: existing.kind,
          requestId: context.requestId,
        },
        'session exists',
      );
      return { session: existing, created: false };
    }

    // An id that ended keeps its tombstone; a new conversation on it starts fresh.
    this.endedSessions.delete(init.id);

    const session = new Session({ ...init, requestId: context.requestId ?? init.requestId }, this.deps);
    this.sessions.set(init.id, session);
    session.onEnded((ended, reason) => this.onEnded(ended, reason));
    setSessionsActive(session.kind, this.count(session.kind));

    log.info(
      {
        event: 'session_created',
        session_id: session.id,
        session_kind: session.kind,
        remote_number: session.remoteNumber,
        destination: context.destination ?? session.localNumber,
        requestId: context.requestId,
      },
      'session created',
    );

    return { session, created: true };
  }

  /** Hands `event` to its session's queue, if that session is live. */
  public route(event: PbxEvent): RouteOutcome {
    const session = this.sessions.get(event.channelId);
    if (session) {
      return session.deliver(event) ? 'delivered' : 'ended';
    }

    if (this.endedSessions.has(event.channelId)) {
      incPbxEventDropped('registry', 'session_ended');
      log.debug(
        {
          event: 'session_event_after_end',
          session_id: event.channelId,
          event_kind: event.kind,
          sequence: event.sequence,
        },
        'event for ended session dropped',
      );
      return 'ended';
    }

    return 'unknown';
  }

  /** Ends every live session, hanging up live calls first; used on shutdown. */
  public async close(reason = 'shutdown'): Promise<void> {
    clearInterval(this.sweepTimer);
    await Promise.all(this.list().map((session) => session.terminate(reason)));
  }

  public sweep(nowMs = Date.now()): void {
    for (const session of this.list()) {
      const { endingAt } = session.getEndInfo();
      if (session.getState() !== 'ENDING' || endingAt === undefined) {
        continue;
      }
      if (nowMs - endingAt < this.endingGraceMs) {
        continue;
      }

      log.warn(
        {
          event: 'session_ending_grace_expired',
          session_id: session.id,
          session_kind: session.kind,
          ending_ms: nowMs - endingAt,
        },
        'session stuck in ending, finalizing',
      );
      session.finalize('ending_grace_expired');
    }

    for (const [sessionId, endedAt] of this.endedSessions.entries()) {
      if (nowMs - endedAt > this.tombstoneTtlMs) {
        this.endedSessions.delete(sessionId);
      }
    }
  }

  /** Drops the live entry for `sessionId` and remembers the id as ended. */
  public remove(sessionId: SessionId): Session | undefined {
    const session = this.sessions.get(sessionId);
    this.sessions.delete(sessionId);
    this.endedSessions.set(sessionId, Date.now());
    if (session) {
      setSessionsActive(session.kind, this.count(session.kind));
    }
    return session;
  }

  private onEnded(session: Session, reason: string): void {
    if (this.sessions.get(session.id) === session) {
      this.remove(session.id);
    }
    incSessionsEnded(session.kind, reason);

    const metrics = session.getMetrics();
    log.info(
      {
        event: 'session_removed',
        session_id: session.id,
        session_kind: session.kind,
        reason,
        operations: metrics.operations,
        session_duration_ms: Date.now() - metrics.createdAt.getTime(),
      },
      'session removed',
    );

    if (this.onSessionEnded) {
      try {
        this.onSessionEnded(session, reason);
      } catch (error) {
        log.error({ err: error, event: 'session_ended_hook_failed', session_id: session.id }, 'session ended hook failed');
      }
    }
  }
}
