import type { PbxEvent } from '../events/types';
import type { PbxCommands } from '../pbx/types';

export type SessionId = string;

export type SessionKind = 'voice' | 'text';

export type SessionState = 'CREATED' | 'ACTIVE' | 'SUSPENDED' | 'ENDING' | 'ENDED';

export type OperationKind =
  | 'answer'
  | 'play'
  | 'gather'
  | 'record'
  | 'prompt'
  | 'send'
  | 'originate'
  | 'delegate';

export interface SessionMetrics {
  createdAt: Date;
  lastActivityAt: Date;
  operations: number;
  eventsHandled: number;
}

export interface GatherOptions {
  numDigits?: number;
  timeoutMs?: number;
  /** Digit that ends entry early; it is not part of the result. */
  terminator?: string;
}

export interface RecordOptions {
  maxDurationMs?: number;
  terminator?: string;
  format?: string;
  /** Seconds of silence that stop the recording; 0 disables. */
  maxSilenceSec?: number;
}

export type RecordingEndReason = 'finished' | 'channel_end';

export interface RecordingRef {
  name: string;
  format: string;
  durationSec?: number;
  endedBy: RecordingEndReason;
}

export interface PromptOptions {
  timeoutMs?: number;
}

export interface MenuOptions<T = unknown> {
  timeoutMs?: number;
  maxRetries?: number;
  retryPrompt?: string;
  /** Runs once when every attempt failed; defaults to hanging up. */
  onExhausted?: ExhaustedAction<T>;
}

export type ExhaustedAction<T = unknown> =
  | { type: 'hangup' }
  | { type: 'invoke'; handler: () => Promise<T> | T }
  | { type: 'value'; value: T };

export type MenuCallbacks<T = unknown> = Record<string, () => Promise<T> | T>;

export type AgentOutcome = 'yielded';

export interface AgentContext {
  sessionId: SessionId;
  kind: SessionKind;
  commands: PbxCommands;
  /** Hands control back to the session's handler. */
  yieldControl(): void;
}

/**
 * An externally supplied conversational capability that takes over a
 * session's inbound events until it yields or the channel ends.
 */
export interface ConversationAgent {
  attach(context: AgentContext): Promise<void> | void;
  handleEvent(event: PbxEvent): Promise<void> | void;
  detach?(reason: 'yielded' | 'channel_ended'): Promise<void> | void;
}

interface CommonSession {
  readonly id: SessionId;
  readonly kind: SessionKind;
  readonly remoteNumber?: string;
  readonly localNumber?: string;
  getState(): SessionState;
  say(text: string): Promise<void>;
  askYesNo(question: string): Promise<boolean>;
  menu<T>(prompt: string, callbacks: MenuCallbacks<T>, options?: MenuOptions<T>): Promise<T | undefined>;
  select(prompt: string, keys: readonly string[], options?: MenuOptions<string>): Promise<string | undefined>;
  hangup(): Promise<void>;
  connectAgent(agent: ConversationAgent): Promise<AgentOutcome>;
}

export interface VoiceSession extends CommonSession {
  readonly kind: 'voice';
  answer(): Promise<void>;
  play(mediaUri: string): Promise<void>;
  gather(prompt: string, options?: GatherOptions): Promise<string>;
  record(options?: RecordOptions): Promise<RecordingRef>;
  /** Speaks `text` with keypad control: 4 rewinds, 5 pauses or resumes, 6 skips ahead. */
  controlSay(text: string): Promise<void>;
}

export interface TextSession extends CommonSession {
  readonly kind: 'text';
  /** Message that opened a remotely started conversation. */
  readonly initialMessage?: string;
  prompt(text: string, options?: PromptOptions): Promise<string>;
}

export type SessionFor<K extends SessionKind> = K extends 'voice' ? VoiceSession : TextSession;

export type CallHandler = (session: VoiceSession) => Promise<void>;
export type TextHandler = (session: TextSession) => Promise<void>;
export type SessionLogic<K extends SessionKind, R> = (session: SessionFor<K>) => Promise<R>;

export interface SessionLogContext {
  requestId?: string;
  destination?: string;
}
