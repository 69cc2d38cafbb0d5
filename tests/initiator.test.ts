import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { TextSession, VoiceSession } from '../src/calls/types';
import { ConfigurationError, OriginationError } from '../src/errors';
import { OutboundInitiator } from '../src/outbound/initiator';
import { Notifier } from '../src/outbound/notifier';
import { DialogServer } from '../src/server';
import { FakePbx, FakeSpeech, waitFor } from './fakes';
import { testConfig } from './testConfig';

function createInitiator(overrides: Record<string, string> = {}) {
  const pbx = new FakePbx();
  const config = testConfig(overrides);
  const server = new DialogServer({ config, gateway: pbx, speech: new FakeSpeech() });
  const initiator = new OutboundInitiator({ config, registry: server.registry, normalizer: server.normalizer });
  return { pbx, config, server, initiator };
}

test('originateCall runs the logic once the PBX reports success', async () => {
  const { pbx, server, initiator } = createInitiator();

  const outcome = initiator.originateCall('5551234', async (call: VoiceSession) => call.id);
  await waitFor(() => pbx.originates.length === 1, 'originate command');
  const request = pbx.originates[0];

  assert.equal(request.kind, 'voice');
  assert.equal(request.target, '5551234');
  assert.equal(request.callerIdNumber, '5550100');
  assert.equal(request.callerIdName, 'Dialog Runtime');
  assert.equal(request.timeoutMs, 45_000);

  server.onRawEvent({
    source: 'ami',
    raw: { Event: 'OriginateResponse', Response: 'Success', Uniqueid: request.sessionId, ActionID: request.sessionId },
  });

  assert.equal(await outcome, request.sessionId);
  assert.deepEqual(pbx.answers, []);
  assert.deepEqual(pbx.hangups, [{ channelId: request.sessionId, reason: 'completed' }]);
  await server.close();
});

test('a failed originate ends the session without running the logic', async () => {
  const { pbx, server, initiator } = createInitiator();
  let ran = false;

  const outcome = initiator.originateCall('5551234', async () => {
    ran = true;
  });
  await waitFor(() => pbx.originates.length === 1, 'originate command');
  const { sessionId } = pbx.originates[0];

  server.onRawEvent({
    source: 'ami',
    raw: { Event: 'OriginateResponse', Response: 'Failure', Reason: '3', Uniqueid: '<null>', ActionID: sessionId },
  });

  await assert.rejects(outcome, { name: 'OriginationError', message: 'origination to 5551234 failed: 3' });
  assert.equal(ran, false);
  assert.equal(server.registry.isEnded(sessionId), true);
  await server.close();
});

test('a rejected originate command surfaces as OriginationError', async () => {
  const { pbx, server, initiator } = createInitiator();
  pbx.failOriginate = true;

  await assert.rejects(initiator.originateCall('5551234', async () => undefined), {
    name: 'OriginationError',
    message: 'origination to 5551234 failed: originate command rejected',
  });
  assert.equal(server.registry.size, 0);
  await server.close();
});

test('originateText normalizes the number and starts the conversation', async () => {
  const { pbx, server, initiator } = createInitiator();

  const id = await initiator.originateText('+1 (555) 123-4567', async (conversation: TextSession) => {
    await conversation.say('Your order shipped');
    return conversation.id;
  });

  assert.equal(id, 'text:5550100:+15551234567');
  assert.equal(pbx.originates[0].kind, 'text');
  assert.deepEqual(pbx.texts, [{ to: '+15551234567', from: '5550100', body: 'Your order shipped' }]);
  await server.close();
});

test('originateText refuses a second conversation with the same number', async () => {
  const { server, initiator } = createInitiator();
  let finish: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    finish = resolve;
  });

  const first = initiator.originateText('5551234', () => gate);
  await assert.rejects(initiator.originateText('5551234', async () => undefined), OriginationError);

  finish();
  await first;
  await server.close();
});

test('originateText rejects targets that are not phone numbers', async () => {
  const { server, initiator } = createInitiator();

  await assert.rejects(initiator.originateText('sales-desk', async () => undefined), {
    name: 'OriginationError',
    message: 'origination to sales-desk failed: not a phone number',
  });
  await server.close();
});

test('notify texts the admin number by default', async () => {
  const { pbx, config, server, initiator } = createInitiator({ ADMIN_PHONE_NUMBER: '5550199' });
  const notifier = new Notifier(initiator, config);

  await notifier.notify('Disk full', undefined, 'text');

  assert.deepEqual(pbx.texts, [{ to: '5550199', from: '5550100', body: 'Disk full' }]);
  await server.close();
});

test('notifyError wraps the message with the system name', async () => {
  const { pbx, config, server, initiator } = createInitiator();
  const notifier = new Notifier(initiator, config);

  await notifier.notifyError('Disk full', '5550123', 'text');

  assert.deepEqual(pbx.texts, [
    {
      to: '5550123',
      from: '5550100',
      body: 'An error has occurred on system Dialog Runtime. Please listen carefully to the following message. Disk full',
    },
  ]);
  await server.close();
});

test('notify without a recipient or admin number is a configuration error', async () => {
  const { config, server, initiator } = createInitiator();
  const notifier = new Notifier(initiator, config);

  await assert.rejects(notifier.notify('Disk full'), ConfigurationError);
  await server.close();
});
