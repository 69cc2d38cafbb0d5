export type RuntimeErrorCode =
  | 'protocol_error'
  | 'channel_gone'
  | 'timeout'
  | 'origination_failed'
  | 'configuration_error'
  | 'session_busy';

export class RuntimeError extends Error {
  public readonly code: RuntimeErrorCode;

  constructor(code: RuntimeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Control-plane connection lost, or the PBX answered with something unusable. */
export class ProtocolError extends RuntimeError {
  public readonly status?: number;
  public readonly responseBody?: unknown;

  constructor(message: string, details: { status?: number; responseBody?: unknown; cause?: unknown } = {}) {
    super('protocol_error', message, { cause: details.cause });
    this.status = details.status;
    this.responseBody = details.responseBody;
  }
}

export class ChannelGoneError extends RuntimeError {
  constructor(
    public readonly sessionId: string,
    public readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super('channel_gone', `session ${sessionId} has ended (${reason})`, options);
  }
}

export class TimeoutError extends RuntimeError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super('timeout', `${operation} timed out after ${timeoutMs}ms`);
  }
}

export class OriginationError extends RuntimeError {
  constructor(
    public readonly target: string,
    public readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super('origination_failed', `origination to ${target} failed: ${reason}`, options);
  }
}

export class ConfigurationError extends RuntimeError {
  constructor(message: string) {
    super('configuration_error', message);
  }
}

export class SessionBusyError extends RuntimeError {
  constructor(
    public readonly sessionId: string,
    public readonly pendingKind: string,
  ) {
    super('session_busy', `session ${sessionId} already has a pending ${pendingKind} operation`);
  }
}

export function isChannelGone(error: unknown): error is ChannelGoneError {
  return error instanceof ChannelGoneError;
}
