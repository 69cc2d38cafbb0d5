import { randomUUID } from 'crypto';
import {
  ChannelGoneError,
  ConfigurationError,
  OriginationError,
  ProtocolError,
  RuntimeError,
  TimeoutError,
} from '../errors';
import type { PbxEvent, PbxEventOf } from '../events/types';
import { log } from '../log';
import { incPbxEventDropped } from '../metrics';
import { buildMenuDefinition, callbacksToOptions, keysToOptions, runMenu } from '../menu/menuEngine';
import type { MenuIO, MenuOption } from '../menu/types';
import type { OriginateRequest, PbxCommands, PlaybackControl } from '../pbx/types';
import type { SpeechResolver } from '../tts/types';
import { OperationSlot, type OperationHandle } from './operationSlot';
import type {
  AgentContext,
  AgentOutcome,
  ConversationAgent,
  GatherOptions,
  MenuCallbacks,
  MenuOptions,
  OperationKind,
  PromptOptions,
  RecordingRef,
  RecordOptions,
  SessionId,
  SessionKind,
  SessionMetrics,
  SessionState,
  TextSession,
  VoiceSession,
} from './types';

const DEFAULT_TERMINATOR = '#';
const DEFAULT_RECORD_MAX_MS = 60_000;
const DEFAULT_RECORD_FORMAT = 'wav';

/** Keypad controls while a controlled playback runs. 5 toggles pause. */
const PLAYBACK_CONTROL_DIGITS: Readonly<Record<string, 'reverse' | 'toggle_pause' | 'forward'>> = {
  '4': 'reverse',
  '5': 'toggle_pause',
  '6': 'forward',
};

export interface SessionSettings {
  commandTimeoutMs: number;
  gatherTimeoutMs: number;
  recordGraceMs: number;
  originateTimeoutMs: number;
  menuMaxRetries: number;
  menuRetryPrompt: string;
  voice?: string;
}

export interface SessionInit {
  id: SessionId;
  kind: SessionKind;
  remoteNumber?: string;
  localNumber?: string;
  /** First inbound message of a text conversation started by the remote side. */
  initialMessage?: string;
  requestId?: string;
}

export interface SessionDeps {
  commands: PbxCommands;
  speech: SpeechResolver;
  settings: SessionSettings;
}

type ActiveOperation =
  | { kind: 'answer'; handle: OperationHandle<void> }
  | { kind: 'play'; handle: OperationHandle<void>; playbackId: string; controls?: { paused: boolean } }
  | {
      kind: 'gather';
      handle: OperationHandle<string>;
      playbackId?: string;
      digits: string;
      numDigits?: number;
      terminator: string;
      timeoutMs: number;
    }
  | { kind: 'record'; handle: OperationHandle<RecordingRef>; name: string; format: string }
  | { kind: 'prompt'; handle: OperationHandle<string>; timeoutMs?: number }
  | { kind: 'send'; handle: OperationHandle<void> }
  | { kind: 'originate'; handle: OperationHandle<void>; target: string }
  | {
      kind: 'delegate';
      handle: OperationHandle<AgentOutcome>;
      agent: ConversationAgent;
      /** Agent deliveries run one after another, off the session's drain loop. */
      relay: Promise<void>;
    };

type EndListener = (session: Session, reason: string) => void;

/**
 * One call leg or text conversation.
 *
 * Inbound events go through a private FIFO drained by this session only;
 * handler logic suspends in at most one primitive at a time. A terminal
 * event settles the pending operation so the handler always resumes.
 */
export class Session {
  public readonly id: SessionId;
  public readonly kind: SessionKind;
  public readonly remoteNumber?: string;
  public readonly localNumber?: string;
  public readonly initialMessage?: string;
  public readonly requestId?: string;

  private state: SessionState = 'CREATED';
  private readonly slot: OperationSlot;
  private active?: ActiveOperation;
  private readonly inbound: PbxEvent[] = [];
  private draining = false;
  private readonly textInbox: string[] = [];
  private readonly endListeners: EndListener[] = [];
  private readonly metrics: SessionMetrics;
  private readonly logContext: Record<string, unknown>;
  private handlerTask?: Promise<void>;
  private answered = false;
  private hangupIssued = false;
  private channelEnded = false;
  private endReason?: string;
  private endingAt?: number;

  constructor(
    init: SessionInit,
    private readonly deps: SessionDeps,
  ) {
    this.id = init.id;
    this.kind = init.kind;
    this.remoteNumber = init.remoteNumber;
    this.localNumber = init.localNumber;
    this.initialMessage = init.initialMessage;
    this.requestId = init.requestId;
    this.slot = new OperationSlot(init.id);

    const now = new Date();
    this.metrics = { createdAt: now, lastActivityAt: now, operations: 0, eventsHandled: 0 };

    this.logContext = {
      session_id: this.id,
      session_kind: this.kind,
      remote_number: this.remoteNumber,
      requestId: this.requestId,
    };
  }

  // ---------- lifecycle ----------

  public getState(): SessionState {
    return this.state;
  }

  public isEnded(): boolean {
    return this.state === 'ENDED';
  }

  public hasPendingOperation(): boolean {
    return this.slot.isPending();
  }

  public getPendingOperationKind(): OperationKind | undefined {
    return this.slot.current?.kind;
  }

  public getEndInfo(): { reason?: string; endingAt?: number } {
    return { reason: this.endReason, endingAt: this.endingAt };
  }

  public getMetrics(): SessionMetrics {
    return {
      createdAt: new Date(this.metrics.createdAt),
      lastActivityAt: new Date(this.metrics.lastActivityAt),
      operations: this.metrics.operations,
      eventsHandled: this.metrics.eventsHandled,
    };
  }

  public onEnded(listener: EndListener): void {
    this.endListeners.push(listener);
  }

  /** Marks a channel that is already up, e.g. an originated call. */
  public markAnswered(): void {
    this.answered = true;
  }

  /**
   * Binds handler logic and schedules it as its own unit of work.
   * The returned promise settles with the logic's outcome after cleanup:
   * hangup is attempted last and the session is finalized.
   */
  public run<R>(logic: () => Promise<R>): Promise<R> {
    if (this.state === 'ENDING' || this.state === 'ENDED') {
      return Promise.reject(new ChannelGoneError(this.id, this.endReason ?? 'ended'));
    }
    if (this.state !== 'CREATED') {
      throw new ConfigurationError(`session ${this.id} cannot bind logic in state ${this.state}`);
    }
    this.state = 'ACTIVE';

    const completion = (async (): Promise<R> => {
      await new Promise<void>((resolve) => setImmediate(resolve));
      try {
        return await logic();
      } catch (error) {
        if (!(error instanceof ChannelGoneError) && !this.endReason) {
          this.endReason = 'handler_failed';
        }
        throw error;
      } finally {
        if (!this.endReason) {
          this.endReason = 'completed';
        }
        if (this.state === 'ACTIVE' || this.state === 'SUSPENDED') {
          await this.hangup();
        } else {
          // Ended from our side (transport loss, shutdown): the channel may still be up.
          await this.releaseChannel();
        }
        this.finalize(this.endReason);
      }
    })();

    this.handlerTask = completion.then(
      () => undefined,
      () => undefined,
    );
    return completion;
  }

  /**
   * Issues the originate command and waits for its result while still in
   * CREATED. On failure the session goes straight to ENDED.
   */
  public async originate(request: Omit<OriginateRequest, 'sessionId' | 'kind' | 'timeoutMs'>): Promise<void> {
    if (this.state !== 'CREATED') {
      throw new ConfigurationError(`session ${this.id} cannot originate in state ${this.state}`);
    }

    const timeoutMs = this.deps.settings.originateTimeoutMs;
    const handle = this.slot.begin<void>('originate', this.id);
    this.active = { kind: 'originate', handle, target: request.target };
    this.metrics.operations += 1;
    handle.armDeadline(timeoutMs, () => {
      handle.reject(new OriginationError(request.target, `no result within ${timeoutMs}ms`));
    });

    try {
      await this.deps.commands.originate({ ...request, sessionId: this.id, kind: this.kind, timeoutMs });
    } catch (error) {
      handle.reject(new OriginationError(request.target, 'originate command rejected', { cause: error }));
    }

    try {
      await handle.result;
    } catch (error) {
      this.clearActive(handle);
      const failure =
        error instanceof OriginationError
          ? error
          : new OriginationError(request.target, error instanceof Error ? error.message : String(error), {
              cause: error,
            });
      this.enterEnding('originate_failed');
      this.finalize('originate_failed');
      throw failure;
    }

    this.clearActive(handle);
    if (this.kind === 'voice') {
      this.answered = true;
    }
  }

  // ---------- event intake ----------

  /** Queues an event for this session; returns false when it was discarded. */
  public deliver(event: PbxEvent): boolean {
    if (this.state === 'ENDED') {
      this.discard(event, 'session_ended');
      return false;
    }

    this.inbound.push(event);
    if (!this.draining) {
      this.draining = true;
      setImmediate(() => {
        void this.drain();
      });
    }
    return true;
  }

  private async drain(): Promise<void> {
    while (this.inbound.length > 0) {
      const event = this.inbound.shift();
      if (!event) {
        continue;
      }

      try {
        await this.handleEvent(event);
      } catch (error) {
        log.error(
          { err: error, event: 'session_event_failed', event_kind: event.kind, ...this.logContext },
          'session event handling failed',
        );
      }
    }

    this.draining = false;
  }

  private async handleEvent(event: PbxEvent): Promise<void> {
    if (this.state === 'ENDED') {
      this.discard(event, 'session_ended');
      return;
    }

    this.metrics.eventsHandled += 1;
    this.touch();

    const active = this.currentOperation();
    if (active?.kind === 'delegate') {
      if (event.kind !== 'channel_ended' && event.kind !== 'error') {
        active.relay = active.relay.then(() => this.forwardToAgent(active, event));
        return;
      }
      this.detachAgent(active.agent, 'channel_ended');
    }

    switch (event.kind) {
      case 'channel_ended':
        this.channelEnded = true;
        this.onTerminal(event.payload.cause);
        return;
      case 'error':
        if (!this.slot.isPending()) {
          this.discard(event, 'no_pending_operation');
          return;
        }
        this.onTerminal('protocol_error', new ProtocolError(event.payload.message, { cause: event.payload.cause }));
        return;
      case 'answered':
        this.answered = true;
        if (active?.kind === 'answer') {
          active.handle.resolve(undefined);
        }
        return;
      case 'playback_finished':
        this.onPlaybackFinished(active, event);
        return;
      case 'dtmf_received':
        this.onDigit(active, event);
        return;
      case 'recording_finished':
        this.onRecordingFinished(active, event);
        return;
      case 'text_received':
        this.onText(active, event);
        return;
      case 'originate_result':
        this.onOriginateResult(active, event);
        return;
      case 'offered':
        this.discard(event, 'duplicate_offer');
        return;
    }
  }

  private onPlaybackFinished(
    active: ActiveOperation | undefined,
    event: PbxEventOf<'playback_finished'>,
  ): void {
    const { playbackId } = event.payload;
    if (active?.kind === 'play' && active.playbackId === playbackId) {
      active.handle.resolve(undefined);
      return;
    }
    if (active?.kind === 'gather' && active.playbackId === playbackId) {
      active.playbackId = undefined;
      active.handle.armDeadline(active.timeoutMs, () => this.completeGather(active, 'timeout'));
      return;
    }
    this.discard(event, 'stale_playback');
  }

  private onDigit(active: ActiveOperation | undefined, event: PbxEventOf<'dtmf_received'>): void {
    if (active?.kind === 'play' && active.controls) {
      this.onPlaybackControlDigit(active, active.controls, event);
      return;
    }
    if (active?.kind !== 'gather') {
      this.discard(event, 'no_gather');
      return;
    }

    const { digit } = event.payload;
    if (active.playbackId) {
      // Typed ahead during the prompt: cut the prompt short and keep the digit.
      const playbackId = active.playbackId;
      active.playbackId = undefined;
      void this.deps.commands.stopPlayback(playbackId).catch((error: unknown) => {
        log.warn({ err: error, event: 'playback_stop_failed', playback_id: playbackId, ...this.logContext }, 'playback stop failed');
      });
    }

    if (digit === active.terminator) {
      this.completeGather(active, 'terminator');
      return;
    }

    active.digits += digit;
    if (active.numDigits !== undefined && active.digits.length >= active.numDigits) {
      this.completeGather(active, 'max_digits');
      return;
    }

    active.handle.armDeadline(active.timeoutMs, () => this.completeGather(active, 'timeout'));
  }

  private onPlaybackControlDigit(
    active: Extract<ActiveOperation, { kind: 'play' }>,
    controls: { paused: boolean },
    event: PbxEventOf<'dtmf_received'>,
  ): void {
    const action = PLAYBACK_CONTROL_DIGITS[event.payload.digit];
    if (!action) {
      this.discard(event, 'no_control');
      return;
    }

    let operation: PlaybackControl;
    if (action === 'toggle_pause') {
      operation = controls.paused ? 'unpause' : 'pause';
      controls.paused = !controls.paused;
    } else {
      operation = action;
    }

    const { playbackId } = active;
    this.deps.commands.controlPlayback(playbackId, operation).catch((error: unknown) => {
      log.warn(
        { err: error, event: 'playback_control_failed', playback_id: playbackId, operation, ...this.logContext },
        'playback control failed',
      );
    });
  }

  private completeGather(
    active: Extract<ActiveOperation, { kind: 'gather' }>,
    reason: 'terminator' | 'max_digits' | 'timeout',
  ): void {
    if (active.handle.resolve(active.digits)) {
      log.info(
        { event: 'gather_completed', reason, digits_count: active.digits.length, ...this.logContext },
        'gather completed',
      );
    }
  }

  private onRecordingFinished(
    active: ActiveOperation | undefined,
    event: PbxEventOf<'recording_finished'>,
  ): void {
    if (active?.kind !== 'record' || active.name !== event.payload.name) {
      this.discard(event, 'stale_recording');
      return;
    }

    if (event.payload.failed) {
      active.handle.reject(
        new ProtocolError(`recording ${active.name} failed: ${event.payload.cause ?? 'unknown'}`),
      );
      return;
    }

    active.handle.resolve({
      name: active.name,
      format: active.format,
      durationSec: event.payload.durationSec,
      endedBy: 'finished',
    });
  }

  private onText(active: ActiveOperation | undefined, event: PbxEventOf<'text_received'>): void {
    if (active?.kind === 'prompt') {
      active.handle.resolve(event.payload.body);
      return;
    }
    if (this.state === 'ENDING') {
      this.discard(event, 'session_ending');
      return;
    }
    this.textInbox.push(event.payload.body);
  }

  private onOriginateResult(
    active: ActiveOperation | undefined,
    event: PbxEventOf<'originate_result'>,
  ): void {
    if (active?.kind !== 'originate') {
      this.discard(event, 'stale_originate');
      return;
    }
    if (event.payload.success) {
      active.handle.resolve(undefined);
      return;
    }
    active.handle.reject(new OriginationError(active.target, event.payload.reason ?? 'failed'));
  }

  private onTerminal(reason: string, cause?: Error): void {
    if (this.state === 'ENDING' || this.state === 'ENDED') {
      log.debug({ event: 'session_terminal_duplicate', reason, ...this.logContext }, 'duplicate terminal event');
      return;
    }

    // Asterisk keeps what was captured when the caller hangs up mid-recording.
    const active = this.currentOperation();
    if (active?.kind === 'record' && !cause) {
      active.handle.resolve({
        name: active.name,
        format: active.format,
        endedBy: 'channel_end',
      });
    }

    this.enterEnding(reason, cause);
    if (!this.handlerTask) {
      this.finalize(reason);
    }
  }

  // ---------- primitives ----------

  public async answer(): Promise<void> {
    this.requireKind('voice', 'answer');
    this.ensureUsable('answer');
    if (this.answered) {
      return;
    }

    const timeoutMs = this.deps.settings.commandTimeoutMs;
    await this.perform<void>('answer', undefined, async (handle) => {
      this.active = { kind: 'answer', handle };
      handle.armDeadline(timeoutMs, () => {
        handle.reject(new TimeoutError('answer', timeoutMs));
      });
      await this.deps.commands.answer(this.id);
      if (this.answered) {
        handle.resolve(undefined);
      }
    });
  }

  public async say(text: string): Promise<void> {
    if (this.kind === 'text') {
      await this.sendMessage(text);
      return;
    }

    await this.ensureAnswered('say');
    const media = await this.deps.speech.resolve(text, this.deps.settings.voice);
    await this.play(media);
  }

  public async play(mediaUri: string): Promise<void> {
    this.requireKind('voice', 'play');
    await this.ensureAnswered('play');

    const playbackId = randomUUID();
    await this.perform<void>('play', playbackId, async (handle) => {
      this.active = { kind: 'play', handle, playbackId };
      await this.deps.commands.play(this.id, { playbackId, media: mediaUri });
    });
  }

  /**
   * Speaks `text` and lets the caller steer it from the keypad: 4 rewinds,
   * 5 pauses or resumes, 6 skips ahead. Resolves when playback finishes.
   */
  public async controlSay(text: string): Promise<void> {
    this.requireKind('voice', 'controlSay');
    await this.ensureAnswered('controlSay');

    const media = await this.deps.speech.resolve(text, this.deps.settings.voice);
    const playbackId = randomUUID();
    await this.perform<void>('play', playbackId, async (handle) => {
      this.active = { kind: 'play', handle, playbackId, controls: { paused: false } };
      await this.deps.commands.play(this.id, { playbackId, media });
    });
  }

  /**
   * Plays the prompt and collects digits until `numDigits`, the terminator,
   * or `timeoutMs` without a new digit after the prompt. A timeout returns
   * whatever was entered, possibly ''.
   */
  public async gather(prompt: string, options: GatherOptions = {}): Promise<string> {
    this.requireKind('voice', 'gather');
    await this.ensureAnswered('gather');

    const numDigits = options.numDigits;
    if (numDigits !== undefined && (!Number.isInteger(numDigits) || numDigits < 1)) {
      throw new ConfigurationError(`gather numDigits must be a positive integer, got ${numDigits}`);
    }
    const timeoutMs = options.timeoutMs ?? this.deps.settings.gatherTimeoutMs;
    const terminator = options.terminator ?? DEFAULT_TERMINATOR;
    const media = prompt.trim() !== '' ? await this.deps.speech.resolve(prompt, this.deps.settings.voice) : undefined;
    const playbackId = media ? randomUUID() : undefined;

    return this.perform<string>('gather', playbackId, async (handle) => {
      const active: Extract<ActiveOperation, { kind: 'gather' }> = {
        kind: 'gather',
        handle,
        playbackId,
        digits: '',
        numDigits,
        terminator,
        timeoutMs,
      };
      this.active = active;

      if (!media || !playbackId) {
        handle.armDeadline(timeoutMs, () => this.completeGather(active, 'timeout'));
        return;
      }
      await this.deps.commands.play(this.id, { playbackId, media });
    });
  }

  public async record(options: RecordOptions = {}): Promise<RecordingRef> {
    this.requireKind('voice', 'record');
    await this.ensureAnswered('record');

    const maxDurationMs = options.maxDurationMs ?? DEFAULT_RECORD_MAX_MS;
    const format = options.format ?? DEFAULT_RECORD_FORMAT;
    const name = `rec-${randomUUID()}`;
    const deadlineMs = maxDurationMs + this.deps.settings.recordGraceMs;

    return this.perform<RecordingRef>('record', name, async (handle) => {
      this.active = { kind: 'record', handle, name, format };
      handle.armDeadline(deadlineMs, () => {
        handle.reject(new TimeoutError('record', deadlineMs));
      });
      await this.deps.commands.record(this.id, {
        name,
        format,
        maxDurationSec: Math.ceil(maxDurationMs / 1000),
        maxSilenceSec: options.maxSilenceSec ?? 0,
        terminateOn: options.terminator ?? DEFAULT_TERMINATOR,
        beep: true,
      });
    });
  }

  /**
   * Sends `text` and returns the next inbound message. Messages that came in
   * while nothing was waiting are consumed first, in arrival order.
   */
  public async prompt(text: string, options: PromptOptions = {}): Promise<string> {
    this.requireKind('text', 'prompt');

    return this.perform<string>('prompt', undefined, async (handle) => {
      this.active = { kind: 'prompt', handle, timeoutMs: options.timeoutMs };
      await this.sendText(text);

      const buffered = this.textInbox.shift();
      if (buffered !== undefined) {
        handle.resolve(buffered);
        return;
      }
      if (options.timeoutMs !== undefined) {
        const timeoutMs = options.timeoutMs;
        handle.armDeadline(timeoutMs, () => {
          handle.reject(new TimeoutError('prompt', timeoutMs));
        });
      }
    });
  }

  public async askYesNo(question: string): Promise<boolean> {
    if (this.kind === 'voice') {
      const digits = await this.gather(`${question} Press 1 for yes or 2 for no.`, { numDigits: 1 });
      return digits === '1';
    }

    const reply = await this.prompt(`${question} (yes/no)`);
    return /^\s*y/i.test(reply);
  }

  public async menu<T>(
    prompt: string,
    callbacks: MenuCallbacks<T>,
    options: MenuOptions<T> = {},
  ): Promise<T | undefined> {
    const result = await this.runMenuWith(prompt, callbacksToOptions(callbacks), options);
    return result.value;
  }

  /** Like menu, but hands the chosen key back instead of invoking a callback. */
  public async select(
    prompt: string,
    keys: readonly string[],
    options: MenuOptions<string> = {},
  ): Promise<string | undefined> {
    const result = await this.runMenuWith(prompt, keysToOptions(keys), options);
    return result.status === 'selected' ? result.key : result.value;
  }

  /** Idempotent; never throws. Only the first call reaches the PBX. */
  public async hangup(): Promise<void> {
    if (this.hangupIssued || this.state === 'ENDING' || this.state === 'ENDED') {
      return;
    }
    this.enterEnding(this.endReason ?? 'hangup');
    await this.releaseChannel();
  }

  /**
   * Ends the session from outside its handler, e.g. on shutdown. A live
   * voice channel gets its one hangup before the session is finalized.
   */
  public async terminate(reason: string): Promise<void> {
    if (this.state === 'ENDED') {
      return;
    }
    this.enterEnding(reason);
    await this.releaseChannel();
    this.finalize(reason);
  }

  /**
   * Hands inbound events to `agent` until it yields or the channel ends.
   */
  public async connectAgent(agent: ConversationAgent): Promise<AgentOutcome> {
    if (this.kind === 'voice') {
      await this.ensureAnswered('connect_agent');
    }

    return this.perform<AgentOutcome>('delegate', undefined, async (handle) => {
      this.active = { kind: 'delegate', handle, agent, relay: Promise.resolve() };
      const context: AgentContext = {
        sessionId: this.id,
        kind: this.kind,
        commands: this.deps.commands,
        yieldControl: () => {
          if (handle.resolve('yielded')) {
            log.info({ event: 'agent_yielded', ...this.logContext }, 'agent yielded control');
            this.detachAgent(agent, 'yielded');
          }
        },
      };
      log.info({ event: 'agent_connected', ...this.logContext }, 'agent connected');
      await agent.attach(context);
    });
  }

  // ---------- kind-restricted views ----------

  public asVoice(): VoiceSession {
    this.requireKind('voice', 'asVoice');
    return {
      id: this.id,
      kind: 'voice',
      remoteNumber: this.remoteNumber,
      localNumber: this.localNumber,
      getState: () => this.getState(),
      answer: () => this.answer(),
      say: (text) => this.say(text),
      play: (mediaUri) => this.play(mediaUri),
      gather: (prompt, options) => this.gather(prompt, options),
      record: (options) => this.record(options),
      askYesNo: (question) => this.askYesNo(question),
      menu: <T>(prompt: string, callbacks: MenuCallbacks<T>, options?: MenuOptions<T>) =>
        this.menu(prompt, callbacks, options),
      select: (prompt, keys, options) => this.select(prompt, keys, options),
      hangup: () => this.hangup(),
      connectAgent: (agent) => this.connectAgent(agent),
      controlSay: (text) => this.controlSay(text),
    };
  }

  public asText(): TextSession {
    this.requireKind('text', 'asText');
    return {
      id: this.id,
      kind: 'text',
      remoteNumber: this.remoteNumber,
      localNumber: this.localNumber,
      initialMessage: this.initialMessage,
      getState: () => this.getState(),
      say: (text) => this.say(text),
      prompt: (text, options) => this.prompt(text, options),
      askYesNo: (question) => this.askYesNo(question),
      menu: <T>(prompt: string, callbacks: MenuCallbacks<T>, options?: MenuOptions<T>) =>
        this.menu(prompt, callbacks, options),
      select: (prompt, keys, options) => this.select(prompt, keys, options),
      hangup: () => this.hangup(),
      connectAgent: (agent) => this.connectAgent(agent),
    };
  }

  // ---------- internals ----------

  /**
   * Registers the operation, runs `start` to issue its command, then
   * suspends until an event, deadline or termination settles it.
   */
  private async perform<T>(
    kind: OperationKind,
    correlationKey: string | undefined,
    start: (handle: OperationHandle<T>) => Promise<void>,
  ): Promise<T> {
    this.ensureUsable(kind);

    const handle = this.slot.begin<T>(kind, correlationKey);
    this.state = 'SUSPENDED';
    this.metrics.operations += 1;

    try {
      await start(handle);
    } catch (error) {
      handle.reject(
        error instanceof RuntimeError
          ? error
          : new ProtocolError(`${kind} command failed`, { cause: error }),
      );
    }

    try {
      return await handle.result;
    } finally {
      this.clearActive(handle);
      if (this.state === 'SUSPENDED') {
        this.state = 'ACTIVE';
      }
      this.touch();
    }
  }

  private async sendMessage(text: string): Promise<void> {
    await this.perform<void>('send', undefined, async (handle) => {
      this.active = { kind: 'send', handle };
      await this.sendText(text);
      handle.resolve(undefined);
    });
  }

  private async sendText(body: string): Promise<void> {
    if (!this.remoteNumber || !this.localNumber) {
      throw new ConfigurationError(`text session ${this.id} has no addresses`);
    }
    await this.deps.commands.sendText({ to: this.remoteNumber, from: this.localNumber, body });
  }

  private async runMenuWith<T>(
    prompt: string,
    options: Record<string, MenuOption<T>>,
    menuOptions: MenuOptions<T>,
  ) {
    const definition = buildMenuDefinition(prompt, options, {
      timeoutMs: menuOptions.timeoutMs,
      maxRetries: menuOptions.maxRetries ?? this.deps.settings.menuMaxRetries,
      retryPrompt: menuOptions.retryPrompt ?? this.deps.settings.menuRetryPrompt,
      onExhausted: menuOptions.onExhausted,
      dtmfOnly: this.kind === 'voice',
    });

    const io: MenuIO =
      this.kind === 'voice'
        ? {
            ask: (text, tokenLength, timeoutMs) => this.gather(text, { numDigits: tokenLength, timeoutMs }),
            hangup: () => this.hangup(),
          }
        : {
            ask: (text, _tokenLength, timeoutMs) => this.prompt(text, { timeoutMs }),
            hangup: () => this.hangup(),
          };

    return runMenu(io, definition, this.logContext);
  }

  private async forwardToAgent(
    active: Extract<ActiveOperation, { kind: 'delegate' }>,
    event: PbxEvent,
  ): Promise<void> {
    if (!active.handle.isCurrent()) {
      this.discard(event, 'agent_detached');
      return;
    }
    try {
      await active.agent.handleEvent(event);
    } catch (error) {
      log.error({ err: error, event: 'agent_event_failed', event_kind: event.kind, ...this.logContext }, 'agent failed handling event');
      if (active.handle.reject(error instanceof Error ? error : new Error(String(error)))) {
        this.detachAgent(active.agent, 'yielded');
      }
    }
  }

  /** Sends the session's single hangup command, unless the channel is already gone. */
  private async releaseChannel(): Promise<void> {
    if (this.hangupIssued) {
      return;
    }
    this.hangupIssued = true;
    if (this.kind !== 'voice' || this.channelEnded) {
      return;
    }

    try {
      await this.deps.commands.hangup(this.id, this.endReason);
    } catch (error) {
      log.warn({ err: error, event: 'session_hangup_failed', ...this.logContext }, 'session hangup failed');
    }
  }

  private detachAgent(agent: ConversationAgent, reason: 'yielded' | 'channel_ended'): void {
    if (!agent.detach) {
      return;
    }
    void Promise.resolve()
      .then(() => agent.detach?.(reason))
      .catch((error: unknown) => {
        log.warn({ err: error, event: 'agent_detach_failed', reason, ...this.logContext }, 'agent detach failed');
      });
  }

  private async ensureAnswered(operation: string): Promise<void> {
    this.ensureUsable(operation);
    if (this.answered) {
      return;
    }
    log.warn(
      { event: 'session_auto_answer', operation, ...this.logContext },
      'channel was not explicitly answered, answering now',
    );
    await this.answer();
  }

  private ensureUsable(operation: string): void {
    if (this.state === 'ENDING' || this.state === 'ENDED') {
      throw new ChannelGoneError(this.id, this.endReason ?? 'ended');
    }
    if (this.state === 'CREATED' && operation !== 'originate') {
      throw new ConfigurationError(`session ${this.id} has no bound logic; ${operation} is not available yet`);
    }
  }

  private requireKind(kind: SessionKind, operation: string): void {
    if (this.kind !== kind) {
      throw new ConfigurationError(`${operation} is only available on ${kind} sessions`);
    }
  }

  private currentOperation(): ActiveOperation | undefined {
    const active = this.active;
    if (active && !active.handle.isCurrent()) {
      this.active = undefined;
      return undefined;
    }
    return active;
  }

  private clearActive(handle: OperationHandle<unknown>): void {
    if (this.active?.handle === handle) {
      this.active = undefined;
    }
  }

  private enterEnding(reason: string, cause?: Error): void {
    if (this.state === 'ENDING' || this.state === 'ENDED') {
      return;
    }
    this.state = 'ENDING';
    this.endReason = reason;
    this.endingAt = Date.now();

    const aborted = this.slot.abort(new ChannelGoneError(this.id, reason, { cause }));
    this.active = undefined;
    this.textInbox.length = 0;

    log.info(
      { event: 'session_ending', reason, aborted_operation: aborted?.kind, ...this.logContext },
      'session ending',
    );
  }

  /** Moves to ENDED; safe to call more than once. */
  public finalize(reason: string): void {
    if (this.state === 'ENDED') {
      return;
    }
    this.enterEnding(reason);
    this.state = 'ENDED';
    this.inbound.length = 0;

    const durationMs = Date.now() - this.metrics.createdAt.getTime();
    log.info(
      {
        event: 'session_ended',
        reason: this.endReason ?? reason,
        operations: this.metrics.operations,
        events_handled: this.metrics.eventsHandled,
        session_duration_ms: durationMs,
        ...this.logContext,
      },
      'session ended',
    );

    for (const listener of this.endListeners) {
      try {
        listener(this, this.endReason ?? reason);
      } catch (error) {
        log.error({ err: error, event: 'session_end_listener_failed', ...this.logContext }, 'session end listener failed');
      }
    }
  }

  private discard(event: PbxEvent, reason: string): void {
    incPbxEventDropped('session', reason);
    log.debug(
      { event: 'session_event_discarded', reason, event_kind: event.kind, sequence: event.sequence, ...this.logContext },
      'session event discarded',
    );
  }

  private touch(): void {
    this.metrics.lastActivityAt = new Date();
  }
}
