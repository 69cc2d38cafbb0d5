import assert from 'node:assert/strict';
import { test } from 'node:test';
import { conversationId, EventNormalizer, extractNumber } from '../src/events/normalizer';
import type { PbxEvent, RawPbxEvent } from '../src/events/types';

function normalizeOne(input: RawPbxEvent): Pick<PbxEvent, 'channelId' | 'kind' | 'payload'> | null {
  const event = new EventNormalizer().normalize(input);
  return event ? { channelId: event.channelId, kind: event.kind, payload: event.payload } : null;
}

test('extractNumber reduces SIP addresses and dial strings to the number', () => {
  assert.equal(extractNumber('pjsip:+15551234567@gw.test'), '+15551234567');
  assert.equal(extractNumber('"Alice" <sip:5551234@pbx.test>'), '5551234');
  assert.equal(extractNumber('sips:5551234@pbx.test:5061'), '5551234');
  assert.equal(extractNumber(' +1 (555) 123-4567 '), '+15551234567');
  assert.equal(conversationId('5550100', '5551234'), 'text:5550100:5551234');
});

test('StasisStart becomes an inbound voice offer', () => {
  const event = normalizeOne({
    source: 'ari',
    raw: {
      type: 'StasisStart',
      args: [],
      channel: { id: 'chan-1', dialplan: { exten: '5550100' }, caller: { number: '5551234' } },
    },
  });

  assert.deepEqual(event, {
    channelId: 'chan-1',
    kind: 'offered',
    payload: { sessionKind: 'voice', destination: '5550100', caller: '5551234' },
  });
});

test('StasisStart of an originated channel is not an offer', () => {
  const event = normalizeOne({
    source: 'ari',
    raw: { type: 'StasisStart', args: ['originated'], channel: { id: 'chan-1', dialplan: { exten: 's' } } },
  });
  assert.equal(event, null);
});

test('channel state changes only report answered once the channel is up', () => {
  assert.deepEqual(
    normalizeOne({ source: 'ari', raw: { type: 'ChannelStateChange', channel: { id: 'chan-1', state: 'Up' } } }),
    { channelId: 'chan-1', kind: 'answered', payload: {} },
  );
  assert.equal(
    normalizeOne({ source: 'ari', raw: { type: 'ChannelStateChange', channel: { id: 'chan-1', state: 'Ringing' } } }),
    null,
  );
});

test('playback and recording events are routed by their target channel', () => {
  assert.deepEqual(
    normalizeOne({
      source: 'ari',
      raw: { type: 'PlaybackFinished', playback: { id: 'pb-1', target_uri: 'channel:chan-1' } },
    }),
    { channelId: 'chan-1', kind: 'playback_finished', payload: { playbackId: 'pb-1' } },
  );

  assert.deepEqual(
    normalizeOne({
      source: 'ari',
      raw: { type: 'RecordingFailed', recording: { name: 'rec-1', target_uri: 'channel:chan-1' } },
    }),
    {
      channelId: 'chan-1',
      kind: 'recording_finished',
      payload: { name: 'rec-1', durationSec: undefined, failed: true, cause: 'recording_failed' },
    },
  );
});

test('keypad digits come from either feed, ignoring digits we sent', () => {
  assert.deepEqual(
    normalizeOne({
      source: 'ari',
      raw: { type: 'ChannelDtmfReceived', digit: '5', duration_ms: 120, channel: { id: 'chan-1' } },
    }),
    { channelId: 'chan-1', kind: 'dtmf_received', payload: { digit: '5', durationMs: 120 } },
  );
  assert.deepEqual(
    normalizeOne({ source: 'ami', raw: { Event: 'DTMFEnd', Uniqueid: 'chan-1', Digit: '#', Direction: 'Received' } }),
    { channelId: 'chan-1', kind: 'dtmf_received', payload: { digit: '#', durationMs: undefined } },
  );
  assert.equal(
    normalizeOne({ source: 'ami', raw: { Event: 'DTMFEnd', Uniqueid: 'chan-1', Digit: '1', Direction: 'Sent' } }),
    null,
  );
});

test('hangups from either feed end the channel with a cause', () => {
  assert.deepEqual(
    normalizeOne({
      source: 'ari',
      raw: { type: 'ChannelDestroyed', cause: 16, cause_txt: 'Normal Clearing', channel: { id: 'chan-1' } },
    }),
    { channelId: 'chan-1', kind: 'channel_ended', payload: { cause: 'Normal Clearing' } },
  );
  assert.deepEqual(
    normalizeOne({ source: 'ari', raw: { type: 'ChannelDestroyed', cause: 17, channel: { id: 'chan-1' } } }),
    { channelId: 'chan-1', kind: 'channel_ended', payload: { cause: 'cause_17' } },
  );
  assert.deepEqual(
    normalizeOne({ source: 'ami', raw: { Event: 'Hangup', Uniqueid: 'chan-1', Cause: '16', 'Cause-txt': 'Normal Clearing' } }),
    { channelId: 'chan-1', kind: 'channel_ended', payload: { cause: 'Normal Clearing' } },
  );
});

test('a failed originate without a channel is keyed by its action id', () => {
  assert.deepEqual(
    normalizeOne({
      source: 'ami',
      raw: { Event: 'OriginateResponse', Response: 'Failure', Reason: '5', Uniqueid: '<null>', ActionID: 'sess-1' },
    }),
    {
      channelId: 'sess-1',
      kind: 'originate_result',
      payload: { success: false, reason: '5', actionId: 'sess-1' },
    },
  );
});

test('inbound texts are keyed by conversation', () => {
  assert.deepEqual(
    normalizeOne({
      source: 'ari',
      raw: {
        type: 'TextMessageReceived',
        message: { from: '"Alice" <sip:5551234@pbx.test>', to: 'pjsip:5550100@pbx.test', body: 'hello' },
      },
    }),
    {
      channelId: 'text:5550100:5551234',
      kind: 'text_received',
      payload: { from: '5551234', to: '5550100', body: 'hello' },
    },
  );

  assert.deepEqual(
    normalizeOne({
      source: 'ami',
      raw: {
        Event: 'UserEvent',
        UserEvent: 'DialogText',
        From: 'sip:5551234@pbx.test',
        To: 'sip:5550100@pbx.test',
        Body: Buffer.from('héllo there', 'utf8').toString('base64'),
      },
    }),
    {
      channelId: 'text:5550100:5551234',
      kind: 'text_received',
      payload: { from: '5551234', to: '5550100', body: 'héllo there' },
    },
  );
});

test('malformed and unknown events are dropped', () => {
  assert.equal(normalizeOne({ source: 'ari', raw: 'not an object' }), null);
  assert.equal(normalizeOne({ source: 'ari', raw: { type: 'PlaybackFinished' } }), null);
  assert.equal(normalizeOne({ source: 'ari', raw: { type: 'BridgeCreated' } }), null);
  assert.equal(normalizeOne({ source: 'ami', raw: { Event: 'UserEvent', UserEvent: 'Other' } }), null);
  assert.equal(normalizeOne({ source: 'ami', raw: { Response: 'Success' } }), null);
});

test('normalized events are stamped in arrival order and frozen', () => {
  const normalizer = new EventNormalizer();
  const first = normalizer.normalize({ source: 'ami', raw: { Event: 'Hangup', Uniqueid: 'chan-1' } });
  const second = normalizer.stamp({ channelId: 'chan-2', kind: 'answered', payload: {} }, 'runtime');

  assert.ok(first);
  assert.equal(first.sequence, 1);
  assert.equal(first.source, 'ami');
  assert.deepEqual(first.payload, { cause: 'hangup' });
  assert.equal(second.sequence, 2);
  assert.equal(second.source, 'runtime');
  assert.equal(Object.isFrozen(first), true);
  assert.equal(Object.isFrozen(first.payload), true);
});
