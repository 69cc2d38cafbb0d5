import type { SessionKind } from '../calls/types';
import type { RawPbxEvent } from '../events/types';

export interface PlayRequest {
  playbackId: string;
  /** ARI media URI, e.g. `sound:tts/hello` or `recording:rec-1`. */
  media: string;
}

/** ARI playback control operations. */
export type PlaybackControl = 'pause' | 'unpause' | 'reverse' | 'forward' | 'restart';

export interface RecordRequest {
  name: string;
  format: string;
  maxDurationSec: number;
  maxSilenceSec: number;
  /** DTMF that stops the recording: a digit, `any` or `none`. */
  terminateOn: string;
  beep: boolean;
}

export interface OriginateRequest {
  sessionId: string;
  kind: SessionKind;
  target: string;
  callerIdNumber: string;
  callerIdName: string;
  timeoutMs: number;
}

export interface SendTextRequest {
  to: string;
  from: string;
  body: string;
}

/**
 * Abstract control commands against the PBX. Completion is reported back
 * through the event feed, not through these promises, which only cover
 * command acceptance.
 */
export interface PbxCommands {
  answer(channelId: string): Promise<void>;
  play(channelId: string, request: PlayRequest): Promise<void>;
  stopPlayback(playbackId: string): Promise<void>;
  controlPlayback(playbackId: string, operation: PlaybackControl): Promise<void>;
  record(channelId: string, request: RecordRequest): Promise<void>;
  hangup(channelId: string, reason?: string): Promise<void>;
  originate(request: OriginateRequest): Promise<void>;
  sendText(request: SendTextRequest): Promise<void>;
  registerExtension(number: string, kind: SessionKind): Promise<void>;
}

export interface PbxEventSink {
  onEvent(event: RawPbxEvent): void;
  /** A feed lost its connection; outstanding operations cannot complete. */
  onTransportError(source: RawPbxEvent['source'], error: Error): void;
}

export interface PbxEventSource {
  start(sink: PbxEventSink): Promise<void>;
  stop(): Promise<void>;
}
