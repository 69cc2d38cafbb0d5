import { SessionBusyError } from '../errors';
import { startOperationTimer } from '../metrics';
import type { OperationKind, SessionId } from './types';

export interface PendingOperation {
  readonly id: number;
  readonly kind: OperationKind;
  readonly correlationKey?: string;
  readonly startedAt: number;
}

export interface OperationHandle<T> {
  readonly op: PendingOperation;
  readonly result: Promise<T>;
  isCurrent(): boolean;
  resolve(value: T): boolean;
  reject(error: Error): boolean;
  /** (Re)starts the deadline; `onDeadline` only runs while the operation is still current. */
  armDeadline(deadlineMs: number, onDeadline: () => void): void;
  clearDeadline(): void;
}

interface SlotEntry {
  op: PendingOperation;
  timer?: NodeJS.Timeout;
  fail: (error: Error) => void;
}

/**
 * Holds the single in-flight operation of a session.
 *
 * Settling clears the slot in the same synchronous step that wakes the
 * waiter, so an event arriving afterwards finds no operation to resolve.
 */
export class OperationSlot {
  private entry?: SlotEntry;
  private nextId = 0;

  constructor(private readonly sessionId: SessionId) {}

  public get current(): PendingOperation | undefined {
    return this.entry?.op;
  }

  public isPending(): boolean {
    return this.entry !== undefined;
  }

  public begin<T>(kind: OperationKind, correlationKey?: string): OperationHandle<T> {
    if (this.entry) {
      throw new SessionBusyError(this.sessionId, this.entry.op.kind);
    }

    this.nextId += 1;
    const op: PendingOperation = {
      id: this.nextId,
      kind,
      correlationKey,
      startedAt: Date.now(),
    };

    const endTimer = startOperationTimer(kind);
    const callbacks: { resolve?: (value: T) => void; reject?: (error: Error) => void } = {};
    const result = new Promise<T>((resolve, reject) => {
      callbacks.resolve = resolve;
      callbacks.reject = reject;
    });
    // The owner awaits `result` only after its command is issued, so it may settle first.
    result.catch(() => undefined);

    const entry: SlotEntry = {
      op,
      fail: (error) => {
        endTimer(error.name);
        callbacks.reject?.(error);
      },
    };
    this.entry = entry;

    const release = (): boolean => {
      if (this.entry !== entry) {
        return false;
      }
      if (entry.timer) {
        clearTimeout(entry.timer);
      }
      this.entry = undefined;
      return true;
    };

    return {
      op,
      result,
      isCurrent: () => this.entry === entry,
      resolve: (value) => {
        if (!release()) {
          return false;
        }
        endTimer('resolved');
        callbacks.resolve?.(value);
        return true;
      },
      reject: (error) => {
        if (!release()) {
          return false;
        }
        entry.fail(error);
        return true;
      },
      armDeadline: (deadlineMs, onDeadline) => {
        if (this.entry !== entry) {
          return;
        }
        if (entry.timer) {
          clearTimeout(entry.timer);
        }
        entry.timer = setTimeout(() => {
          if (this.entry === entry) {
            onDeadline();
          }
        }, deadlineMs);
      },
      clearDeadline: () => {
        if (this.entry === entry && entry.timer) {
          clearTimeout(entry.timer);
          entry.timer = undefined;
        }
      },
    };
  }

  /** Rejects whatever is pending; used on termination. */
  public abort(error: Error): PendingOperation | undefined {
    const entry = this.entry;
    if (!entry) {
      return undefined;
    }
    if (entry.timer) {
      clearTimeout(entry.timer);
    }
    this.entry = undefined;
    entry.fail(error);
    return entry.op;
  }
}
