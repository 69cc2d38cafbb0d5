import { log } from '../log';
import { incPbxEvent, incPbxEventDropped } from '../metrics';
import type {
  EventSource,
  NormalizedEventDraft,
  PbxEvent,
  RawEventFields,
  RawPbxEvent,
} from './types';

export const ORIGINATED_STASIS_ARG = 'originated';
/** UserEvent name raised by the dialplan entry of a registered text number. */
export const TEXT_USER_EVENT = 'DialogText';

type Translation = NormalizedEventDraft | { drop: 'unhandled' | 'malformed'; eventType?: string };

function isRecord(value: unknown): value is RawEventFields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function getNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function getRecord(value: unknown): RawEventFields | undefined {
  return isRecord(value) ? value : undefined;
}

/**
 * Reduces a SIP/PJSIP URI or dial string to its user part.
 * `pjsip:+15551234567@gw.example`, `<sip:5551234@host>` and `5551234` all
 * yield the bare number.
 */
export function extractNumber(address: string): string {
  let value = address.trim();
  const bracketed = /<([^>]+)>/.exec(value);
  if (bracketed) {
    value = bracketed[1];
  }
  value = value.replace(/^(pj)?sips?:/i, '');
  const at = value.indexOf('@');
  if (at >= 0) {
    value = value.slice(0, at);
  }
  return value.replace(/[\s()-]/g, '');
}

export function conversationId(localNumber: string, remoteNumber: string): string {
  return `text:${localNumber}:${remoteNumber}`;
}

function channelFromTargetUri(targetUri: unknown): string | undefined {
  const uri = getString(targetUri);
  if (!uri || !uri.startsWith('channel:')) {
    return undefined;
  }
  return getString(uri.slice('channel:'.length));
}

export function translateAriEvent(raw: unknown): Translation {
  if (!isRecord(raw)) {
    return { drop: 'malformed' };
  }

  const eventType = getString(raw.type);
  if (!eventType) {
    return { drop: 'malformed' };
  }

  const channel = getRecord(raw.channel);
  const channelId = getString(channel?.id);

  switch (eventType) {
    case 'StasisStart': {
      if (!channel || !channelId) {
        return { drop: 'malformed', eventType };
      }
      const args = Array.isArray(raw.args) ? raw.args : [];
      if (args.includes(ORIGINATED_STASIS_ARG)) {
        return { drop: 'unhandled', eventType };
      }
      const destination = getString(getRecord(channel.dialplan)?.exten);
      if (!destination) {
        return { drop: 'malformed', eventType };
      }
      const caller = getString(getRecord(channel.caller)?.number);
      return {
        channelId,
        kind: 'offered',
        payload: { sessionKind: 'voice', destination, caller },
      };
    }
    case 'ChannelStateChange': {
      if (!channelId) {
        return { drop: 'malformed', eventType };
      }
      if (channel?.state !== 'Up') {
        return { drop: 'unhandled', eventType };
      }
      return { channelId, kind: 'answered', payload: {} };
    }
    case 'ChannelDtmfReceived': {
      const digit = getString(raw.digit);
      if (!channelId || !digit) {
        return { drop: 'malformed', eventType };
      }
      return {
        channelId,
        kind: 'dtmf_received',
        payload: { digit, durationMs: getNumber(raw.duration_ms) },
      };
    }
    case 'PlaybackFinished': {
      const playback = getRecord(raw.playback);
      const playbackId = getString(playback?.id);
      const target = channelFromTargetUri(playback?.target_uri);
      if (!playbackId || !target) {
        return { drop: 'malformed', eventType };
      }
      return { channelId: target, kind: 'playback_finished', payload: { playbackId } };
    }
    case 'RecordingFinished':
    case 'RecordingFailed': {
      const recording = getRecord(raw.recording);
      const name = getString(recording?.name);
      const target = channelFromTargetUri(recording?.target_uri);
      if (!name || !target) {
        return { drop: 'malformed', eventType };
      }
      const failed = eventType === 'RecordingFailed';
      return {
        channelId: target,
        kind: 'recording_finished',
        payload: {
          name,
          durationSec: getNumber(recording?.duration),
          failed,
          cause: failed ? getString(recording?.cause) ?? 'recording_failed' : undefined,
        },
      };
    }
    case 'StasisEnd': {
      if (!channelId) {
        return { drop: 'malformed', eventType };
      }
      return { channelId, kind: 'channel_ended', payload: { cause: 'stasis_end' } };
    }
    case 'ChannelDestroyed': {
      if (!channelId) {
        return { drop: 'malformed', eventType };
      }
      const causeCode = getNumber(raw.cause);
      const cause =
        getString(raw.cause_txt) ?? (causeCode !== undefined ? `cause_${causeCode}` : 'destroyed');
      return { channelId, kind: 'channel_ended', payload: { cause } };
    }
    case 'TextMessageReceived': {
      const message = getRecord(raw.message);
      const fromUri = getString(message?.from);
      const toUri = getString(message?.to);
      const body = typeof message?.body === 'string' ? message.body : undefined;
      if (!fromUri || !toUri || body === undefined) {
        return { drop: 'malformed', eventType };
      }
      const from = extractNumber(fromUri);
      const to = extractNumber(toUri);
      return {
        channelId: conversationId(to, from),
        kind: 'text_received',
        payload: { from, to, body },
      };
    }
    default:
      return { drop: 'unhandled', eventType };
  }
}

export function translateAmiEvent(raw: unknown): Translation {
  if (!isRecord(raw)) {
    return { drop: 'malformed' };
  }

  const eventType = getString(raw.Event);
  if (!eventType) {
    return { drop: 'malformed' };
  }

  const uniqueId = getString(raw.Uniqueid);

  switch (eventType) {
    case 'Hangup': {
      if (!uniqueId) {
        return { drop: 'malformed', eventType };
      }
      const cause = getString(raw['Cause-txt']) ?? getString(raw.Cause) ?? 'hangup';
      return { channelId: uniqueId, kind: 'channel_ended', payload: { cause } };
    }
    case 'DTMFEnd': {
      const digit = getString(raw.Digit);
      if (!uniqueId || !digit) {
        return { drop: 'malformed', eventType };
      }
      if (getString(raw.Direction) === 'Sent') {
        return { drop: 'unhandled', eventType };
      }
      return {
        channelId: uniqueId,
        kind: 'dtmf_received',
        payload: { digit, durationMs: getNumber(raw.DurationMs) },
      };
    }
    case 'OriginateResponse': {
      const actionId = getString(raw.ActionID);
      // A failed originate may never get a usable unique id.
      const target = uniqueId && uniqueId !== '<null>' ? uniqueId : actionId;
      if (!target) {
        return { drop: 'malformed', eventType };
      }
      const response = getString(raw.Response);
      const success = response?.toLowerCase() === 'success';
      return {
        channelId: target,
        kind: 'originate_result',
        payload: {
          success,
          reason: success ? undefined : getString(raw.Reason) ?? response ?? 'unknown',
          actionId,
        },
      };
    }
    case 'UserEvent': {
      if (getString(raw.UserEvent) !== TEXT_USER_EVENT) {
        return { drop: 'unhandled', eventType };
      }
      const fromUri = getString(raw.From);
      const toUri = getString(raw.To);
      const encoded = typeof raw.Body === 'string' ? raw.Body.trim() : undefined;
      if (!fromUri || !toUri || encoded === undefined) {
        return { drop: 'malformed', eventType };
      }
      const from = extractNumber(fromUri);
      const to = extractNumber(toUri);
      return {
        channelId: conversationId(to, from),
        kind: 'text_received',
        payload: { from, to, body: Buffer.from(encoded, 'base64').toString('utf8') },
      };
    }
    default:
      return { drop: 'unhandled', eventType };
  }
}

/**
 * Turns raw feed events into canonical, sequence-stamped PbxEvents.
 * Holds no session state; a bad event is dropped and logged.
 */
export class EventNormalizer {
  private sequence = 0;

  public normalize(input: RawPbxEvent): PbxEvent | null {
    let translation: Translation;
    try {
      translation =
        input.source === 'ari' ? translateAriEvent(input.raw) : translateAmiEvent(input.raw);
    } catch (error) {
      incPbxEventDropped(input.source, 'translate_failed');
      log.warn({ err: error, event: 'pbx_event_translate_failed', source: input.source }, 'pbx event translate failed');
      return null;
    }

    if ('drop' in translation) {
      incPbxEventDropped(input.source, translation.drop);
      if (translation.drop === 'malformed') {
        log.warn(
          { event: 'pbx_event_malformed', source: input.source, event_type: translation.eventType },
          'malformed pbx event dropped',
        );
      } else {
        log.debug(
          { event: 'pbx_event_ignored', source: input.source, event_type: translation.eventType },
          'pbx event ignored',
        );
      }
      return null;
    }

    return this.stamp(translation, input.source);
  }

  public stamp(draft: NormalizedEventDraft, source: EventSource): PbxEvent {
    this.sequence += 1;
    incPbxEvent(source, draft.kind);
    Object.freeze(draft.payload);
    const event: PbxEvent = {
      ...draft,
      source,
      sequence: this.sequence,
      receivedAt: Date.now(),
    };
    return Object.freeze(event);
  }
}
