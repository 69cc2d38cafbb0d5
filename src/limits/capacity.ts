import { log } from '../log';

const FAILURE_REASONS = ['at_capacity'] as const;
export type CapacityFailureReason = (typeof FAILURE_REASONS)[number];

export interface CapacityParams {
  sessionId: string;
  requestId?: string;
}

export interface ReleaseParams {
  sessionId: string;
  requestId?: string;
}

/**
 * Concurrent-session cap for inbound calls. Acquiring twice for the same
 * session is idempotent, so a redelivered offer does not consume a slot.
 */
export class CapacityLimiter {
  private readonly active = new Set<string>();

  constructor(private readonly maxConcurrent: number) {}

  public get inUse(): number {
    return this.active.size;
  }

  public tryAcquire(params: CapacityParams): { ok: true } | { ok: false; reason: CapacityFailureReason } {
    if (this.active.has(params.sessionId)) {
      return { ok: true };
    }

    if (this.active.size >= this.maxConcurrent) {
      log.warn(
        {
          event: 'capacity_denied',
          reason: 'at_capacity',
          session_id: params.sessionId,
          in_use: this.active.size,
          cap: this.maxConcurrent,
          requestId: params.requestId,
        },
        'capacity denied',
      );
      return { ok: false, reason: 'at_capacity' };
    }

    this.active.add(params.sessionId);
    log.info(
      {
        event: 'capacity_acquired',
        session_id: params.sessionId,
        in_use: this.active.size,
        requestId: params.requestId,
      },
      'capacity acquired',
    );
    return { ok: true };
  }

  public release(params: ReleaseParams): void {
    const removed = this.active.delete(params.sessionId);
    if (!removed) {
      return;
    }

    log.info(
      {
        event: 'capacity_released',
        session_id: params.sessionId,
        in_use: this.active.size,
        requestId: params.requestId,
      },
      'capacity released',
    );
  }
}
