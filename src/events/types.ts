import type { SessionKind } from '../calls/types';

export type EventSource = 'ami' | 'ari' | 'runtime';

export type PbxEventKind =
  | 'offered'
  | 'answered'
  | 'dtmf_received'
  | 'playback_finished'
  | 'recording_finished'
  | 'channel_ended'
  | 'text_received'
  | 'originate_result'
  | 'error';

export interface PbxEventPayloads {
  offered: { sessionKind: SessionKind; destination: string; caller?: string };
  answered: Record<string, never>;
  dtmf_received: { digit: string; durationMs?: number };
  playback_finished: { playbackId: string };
  recording_finished: { name: string; durationSec?: number; failed: boolean; cause?: string };
  channel_ended: { cause: string };
  text_received: { from: string; to: string; body: string };
  originate_result: { success: boolean; reason?: string; actionId?: string };
  error: { message: string; cause?: unknown };
}

interface PbxEventBase<K extends PbxEventKind> {
  readonly channelId: string;
  readonly kind: K;
  readonly payload: Readonly<PbxEventPayloads[K]>;
  readonly source: EventSource;
  readonly sequence: number;
  readonly receivedAt: number;
}

export type PbxEventOf<K extends PbxEventKind> = PbxEventBase<K>;

export type PbxEvent = { [K in PbxEventKind]: PbxEventBase<K> }[PbxEventKind];

/** Event as produced by a source translator, before it is stamped. */
export type NormalizedEventDraft = {
  [K in PbxEventKind]: { channelId: string; kind: K; payload: PbxEventPayloads[K] };
}[PbxEventKind];

export type RawEventFields = Record<string, unknown>;

export interface RawPbxEvent {
  source: Exclude<EventSource, 'runtime'>;
  raw: unknown;
}
