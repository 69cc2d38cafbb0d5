import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { TextSession, VoiceSession } from '../src/calls/types';
import { ChannelGoneError, ConfigurationError } from '../src/errors';
import type { RawPbxEvent } from '../src/events/types';
import { DialogServer, UNAVAILABLE_TEXT_REPLY } from '../src/server';
import { FakePbx, FakeSpeech, tick, waitFor } from './fakes';
import { testConfig } from './testConfig';

function createServer(overrides: Record<string, string> = {}) {
  const pbx = new FakePbx();
  const server = new DialogServer({ config: testConfig(overrides), gateway: pbx, speech: new FakeSpeech() });
  return { server, pbx };
}

function stasisStart(channelId: string, exten: string): RawPbxEvent {
  return {
    source: 'ari',
    raw: {
      type: 'StasisStart',
      args: [],
      channel: { id: channelId, dialplan: { exten }, caller: { number: '5551234' } },
    },
  };
}

function inboundText(body: string): RawPbxEvent {
  return {
    source: 'ami',
    raw: {
      Event: 'UserEvent',
      UserEvent: 'DialogText',
      From: 'sip:5551234@pbx.test',
      To: 'sip:5550100@pbx.test',
      Body: Buffer.from(body, 'utf8').toString('base64'),
    },
  };
}

const idle = async (): Promise<void> => undefined;

test('registerExtension validates the number and handlers', () => {
  const { server } = createServer();

  assert.throws(() => server.registerExtension('not-a-number', idle), ConfigurationError);
  assert.throws(() => server.registerExtension('5550100'), ConfigurationError);

  server.registerExtension(' 5550100 ', idle);
  const registration = server.getRegistration('5550100');
  assert.ok(registration);
  assert.equal(registration.callHandler, idle);
  assert.equal(registration.textHandler, undefined);
  assert.equal(Object.isFrozen(registration), true);
});

test('re-registering a number replaces the earlier handlers', async () => {
  const { server, pbx } = createServer();
  const calls: string[] = [];
  server.registerExtension('5550100', async () => {
    calls.push('first');
  });
  server.registerExtension('5550100', async (session: VoiceSession) => {
    calls.push(`second:${session.remoteNumber ?? ''}`);
  });

  server.onRawEvent(stasisStart('chan-1', '5550100'));

  await waitFor(() => pbx.hangups.length === 1, 'call finished');
  assert.deepEqual(calls, ['second:5551234']);
  assert.deepEqual(pbx.hangups, [{ channelId: 'chan-1', reason: 'completed' }]);
  assert.equal(server.registry.size, 0);
  await server.close();
});

test('calls to a number without a call handler are declined', async () => {
  const { server, pbx } = createServer();

  server.onRawEvent(stasisStart('chan-1', '5559999'));

  assert.deepEqual(pbx.hangups, [{ channelId: 'chan-1', reason: 'no_handler' }]);
  assert.equal(server.registry.size, 0);
  await server.close();
});

test('calls over the concurrency cap are declined until a slot frees up', async () => {
  const { server, pbx } = createServer({ MAX_CONCURRENT_SESSIONS: '1' });
  let finish: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    finish = resolve;
  });
  server.registerExtension('5550100', () => gate);

  server.onRawEvent(stasisStart('chan-1', '5550100'));
  server.onRawEvent(stasisStart('chan-2', '5550100'));

  assert.deepEqual(pbx.hangups, [{ channelId: 'chan-2', reason: 'at_capacity' }]);
  assert.equal(server.registry.size, 1);

  finish();
  await waitFor(() => server.registry.size === 0, 'first call ended');

  server.onRawEvent(stasisStart('chan-3', '5550100'));
  await waitFor(() => pbx.hangups.length === 3, 'third call finished');
  assert.deepEqual(pbx.hangups, [
    { channelId: 'chan-2', reason: 'at_capacity' },
    { channelId: 'chan-1', reason: 'completed' },
    { channelId: 'chan-3', reason: 'completed' },
  ]);
  await server.close();
});

test('texts to a number without a text handler get the unavailable reply', async () => {
  const { server, pbx } = createServer();

  server.onRawEvent(inboundText('hi'));

  assert.deepEqual(pbx.texts, [{ to: '5551234', from: '5550100', body: UNAVAILABLE_TEXT_REPLY }]);
  assert.equal(server.registry.size, 0);
  await server.close();
});

test('a text to a registered number starts a conversation with the first message', async () => {
  const { server, pbx } = createServer();
  const seen: Array<{ id: string; initialMessage?: string }> = [];
  server.registerExtension('5550100', undefined, async (session: TextSession) => {
    seen.push({ id: session.id, initialMessage: session.initialMessage });
    await session.say('Got it');
  });

  server.onRawEvent(inboundText('hi'));

  await waitFor(() => pbx.texts.length === 1, 'reply sent');
  assert.deepEqual(seen, [{ id: 'text:5550100:5551234', initialMessage: 'hi' }]);
  assert.deepEqual(pbx.texts, [{ to: '5551234', from: '5550100', body: 'Got it' }]);
  await waitFor(() => server.registry.size === 0, 'conversation ended');
  assert.deepEqual(pbx.hangups, []);
  await server.close();
});

test('serveForever pushes registrations and resolves after close', async () => {
  const { server, pbx } = createServer();
  server.registerExtension('5550100', idle, idle);

  const serving = server.serveForever();
  await waitFor(() => pbx.extensions.length === 2, 'extensions pushed');
  assert.equal(server.isServing, true);
  assert.equal(pbx.started, true);
  assert.deepEqual(pbx.extensions, [
    { number: '5550100', kind: 'voice' },
    { number: '5550100', kind: 'text' },
  ]);

  server.registerExtension('5550200', idle);
  await waitFor(() => pbx.extensions.length === 4, 'late registration pushed');
  assert.deepEqual(pbx.extensions.slice(2), [
    { number: '5550200', kind: 'voice' },
    { number: '5550200', kind: 'text' },
  ]);

  await server.close();
  await serving;
  assert.equal(pbx.stopped, true);
  assert.equal(server.isServing, false);
});

test('losing ARI fails pending voice operations, hangs up the call and spares text sessions', async () => {
  const { server, pbx } = createServer();
  const outcomes: unknown[] = [];
  const textGate: { open?: () => void } = {};
  const opened = new Promise<void>((resolve) => {
    textGate.open = resolve;
  });
  server.registerExtension(
    '5550100',
    async (session: VoiceSession) => {
      try {
        await session.answer();
      } catch (error) {
        outcomes.push(error);
      }
    },
    async (session: TextSession) => {
      await opened;
      await session.say('Still here.');
    },
  );

  const serving = server.serveForever();
  await waitFor(() => pbx.started, 'server started');
  const sink = pbx.sink;
  assert.ok(sink);

  sink.onEvent(stasisStart('chan-1', '5550100'));
  sink.onEvent(inboundText('hello'));
  await waitFor(() => pbx.answers.length === 1 && server.registry.count('text') === 1, 'sessions started');

  sink.onTransportError('ari', new Error('socket closed'));
  await waitFor(() => outcomes.length === 1, 'handler resumed');

  const [failure] = outcomes;
  assert.ok(failure instanceof ChannelGoneError);
  assert.equal(failure.reason, 'protocol_error');
  await waitFor(() => pbx.hangups.length === 1, 'channel released');
  assert.deepEqual(pbx.hangups, [{ channelId: 'chan-1', reason: 'protocol_error' }]);

  textGate.open?.();
  await waitFor(() => pbx.texts.length === 1, 'text reply');
  assert.deepEqual(pbx.texts, [{ to: '5551234', from: '5550100', body: 'Still here.' }]);

  await server.close();
  await serving;
});

test('a repeated offer for a finished call does not run the handler again', async () => {
  const { server, pbx } = createServer();
  let runs = 0;
  server.registerExtension('5550100', async (session: VoiceSession) => {
    runs += 1;
    await session.hangup();
  });

  server.onRawEvent(stasisStart('chan-1', '5550100'));
  await waitFor(() => server.registry.isEnded('chan-1'), 'call ended');

  server.onRawEvent(stasisStart('chan-1', '5550100'));
  await tick();
  await tick();

  assert.equal(runs, 1);
  assert.equal(server.registry.has('chan-1'), false);
  assert.deepEqual(pbx.hangups, [{ channelId: 'chan-1', reason: 'hangup' }]);
  await server.close();
});
