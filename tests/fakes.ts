import type { SessionKind } from '../src/calls/types';
import type { Session, SessionSettings } from '../src/calls/session';
import { EventNormalizer } from '../src/events/normalizer';
import type { NormalizedEventDraft } from '../src/events/types';
import type {
  OriginateRequest,
  PbxCommands,
  PbxEventSink,
  PbxEventSource,
  PlaybackControl,
  PlayRequest,
  RecordRequest,
  SendTextRequest,
} from '../src/pbx/types';
import type { SpeechResolver } from '../src/tts/types';

/** Records every command; events are pushed by the test through `sink`. */
export class FakePbx implements PbxCommands, PbxEventSource {
  public readonly answers: string[] = [];
  public readonly plays: Array<{ channelId: string; request: PlayRequest }> = [];
  public readonly stops: string[] = [];
  public readonly controls: Array<{ playbackId: string; operation: PlaybackControl }> = [];
  public readonly records: Array<{ channelId: string; request: RecordRequest }> = [];
  public readonly hangups: Array<{ channelId: string; reason?: string }> = [];
  public readonly originates: OriginateRequest[] = [];
  public readonly texts: SendTextRequest[] = [];
  public readonly extensions: Array<{ number: string; kind: SessionKind }> = [];
  public sink?: PbxEventSink;
  public failOriginate = false;
  public started = false;
  public stopped = false;

  async answer(channelId: string): Promise<void> {
    this.answers.push(channelId);
  }

  async play(channelId: string, request: PlayRequest): Promise<void> {
    this.plays.push({ channelId, request });
  }

  async stopPlayback(playbackId: string): Promise<void> {
    this.stops.push(playbackId);
  }

  async controlPlayback(playbackId: string, operation: PlaybackControl): Promise<void> {
    this.controls.push({ playbackId, operation });
  }

  async record(channelId: string, request: RecordRequest): Promise<void> {
    this.records.push({ channelId, request });
  }

  async hangup(channelId: string, reason?: string): Promise<void> {
    this.hangups.push({ channelId, reason });
  }

  async originate(request: OriginateRequest): Promise<void> {
    this.originates.push(request);
    if (this.failOriginate) {
      throw new Error('originate refused');
    }
  }

  async sendText(request: SendTextRequest): Promise<void> {
    this.texts.push(request);
  }

  async registerExtension(number: string, kind: SessionKind): Promise<void> {
    this.extensions.push({ number, kind });
  }

  async start(sink: PbxEventSink): Promise<void> {
    this.sink = sink;
    this.started = true;
  }

  async stop(): Promise<void> {
    this.stopped = true;
  }
}

export class FakeSpeech implements SpeechResolver {
  public readonly requests: string[] = [];

  async resolve(text: string): Promise<string> {
    this.requests.push(text);
    return `sound:tts/${text}`;
  }
}

export const testSettings: SessionSettings = {
  commandTimeoutMs: 1_000,
  gatherTimeoutMs: 1_000,
  recordGraceMs: 1_000,
  originateTimeoutMs: 1_000,
  menuMaxRetries: 2,
  menuRetryPrompt: 'Try again.',
};

export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export async function waitFor(predicate: () => boolean, label = 'condition'): Promise<void> {
  for (let attempt = 0; attempt < 200; attempt += 1) {
    if (predicate()) {
      return;
    }
    await tick();
  }
  throw new Error(`timed out waiting for ${label}`);
}

/** Stamps a draft the way the normalizer would and queues it on the session. */
export function push(session: Session, draft: NormalizedEventDraft, normalizer = new EventNormalizer()): boolean {
  return session.deliver(normalizer.stamp(draft, 'ari'));
}
