import assert from 'node:assert/strict';
import { test } from 'node:test';
import { OperationSlot } from '../src/calls/operationSlot';
import { ChannelGoneError, SessionBusyError, TimeoutError } from '../src/errors';

test('only one operation can be pending at a time', () => {
  const slot = new OperationSlot('chan-1');
  const handle = slot.begin<string>('gather', 'pb-1');

  assert.equal(slot.current?.kind, 'gather');
  assert.equal(slot.current?.correlationKey, 'pb-1');
  assert.throws(() => slot.begin<void>('play'), SessionBusyError);

  assert.equal(handle.resolve('12'), true);
  assert.equal(slot.isPending(), false);
});

test('settling frees the slot and later settles are ignored', async () => {
  const slot = new OperationSlot('chan-1');
  const handle = slot.begin<string>('prompt');

  assert.equal(handle.resolve('first'), true);
  assert.equal(handle.resolve('second'), false);
  assert.equal(handle.reject(new Error('late')), false);
  assert.equal(handle.isCurrent(), false);
  assert.equal(await handle.result, 'first');

  const next = slot.begin<void>('play');
  assert.equal(next.op.id, 2);
  next.resolve(undefined);
});

test('the deadline callback runs while the operation is current', async () => {
  const slot = new OperationSlot('chan-1');
  const handle = slot.begin<void>('answer');
  handle.armDeadline(5, () => {
    handle.reject(new TimeoutError('answer', 5));
  });

  await assert.rejects(handle.result, TimeoutError);
  assert.equal(slot.isPending(), false);
});

test('a settled operation never sees its deadline', async () => {
  const slot = new OperationSlot('chan-1');
  const handle = slot.begin<string>('gather');
  let fired = false;
  handle.armDeadline(5, () => {
    fired = true;
  });

  handle.resolve('1');
  await new Promise((resolve) => setTimeout(resolve, 20));
  assert.equal(fired, false);
});

test('abort rejects the pending operation and reports it', async () => {
  const slot = new OperationSlot('chan-1');
  const handle = slot.begin<void>('record', 'rec-1');

  const aborted = slot.abort(new ChannelGoneError('chan-1', 'hangup'));

  assert.equal(aborted?.kind, 'record');
  assert.equal(slot.abort(new ChannelGoneError('chan-1', 'hangup')), undefined);
  assert.equal(handle.resolve(undefined), false);
  await assert.rejects(handle.result, ChannelGoneError);
});
