import assert from 'node:assert/strict';
import { test } from 'node:test';
import { AmiFrameParser, isResponse, isSuccess, parseMessage, serializeAction } from '../src/ami/amiProtocol';

test('serializeAction writes one field per line and ends with a blank line', () => {
  const wire = serializeAction({
    Action: 'MessageSend',
    ActionID: 'ami-1',
    Base64Body: 'aGk=',
    Variable: ['Remote-Party-ID=<sip:5550100@pbx.test>', 'X-Tag=1'],
    Async: true,
    Timeout: 30000,
    Skipped: undefined,
  });

  assert.equal(
    wire,
    'Action: MessageSend\r\n' +
      'ActionID: ami-1\r\n' +
      'Base64Body: aGk=\r\n' +
      'Variable: Remote-Party-ID=<sip:5550100@pbx.test>\r\n' +
      'Variable: X-Tag=1\r\n' +
      'Async: yes\r\n' +
      'Timeout: 30000\r\n\r\n',
  );
});

test('line breaks inside a value cannot start a new field', () => {
  assert.equal(
    serializeAction({ Action: 'UserEvent', Body: 'line one\r\nAction: Logoff' }),
    'Action: UserEvent\r\nBody: line one Action: Logoff\r\n\r\n',
  );
});

test('parseMessage keeps everything after the first colon', () => {
  assert.deepEqual(parseMessage('Event: UserEvent\r\nTo: sip:5550100@pbx.test\r\nnot a field'), {
    Event: 'UserEvent',
    To: 'sip:5550100@pbx.test',
  });
  assert.equal(parseMessage('\r\n'), undefined);
});

test('the frame parser reads the banner and reassembles split messages', () => {
  const parser = new AmiFrameParser();

  assert.deepEqual(parser.push('Asterisk Call Manager/7.0.3\r\nResponse: Success\r\nActionID: ami-1\r\n'), []);
  assert.equal(parser.banner, 'Asterisk Call Manager/7.0.3');

  const messages = parser.push('Message: Authentication accepted\r\n\r\nEvent: FullyBooted\r\n\r\nEvent: Hang');
  assert.deepEqual(messages, [
    { Response: 'Success', ActionID: 'ami-1', Message: 'Authentication accepted' },
    { Event: 'FullyBooted' },
  ]);

  assert.deepEqual(parser.push('up\r\nUniqueid: chan-1\r\n\r\n'), [{ Event: 'Hangup', Uniqueid: 'chan-1' }]);
});

test('responses are told apart from events', () => {
  assert.equal(isResponse({ Response: 'Success', ActionID: 'ami-1' }), true);
  assert.equal(isResponse({ Event: 'OriginateResponse', Response: 'Failure' }), false);
  assert.equal(isSuccess({ Response: 'Goodbye' }), true);
  assert.equal(isSuccess({ Response: 'Error', Message: 'Permission denied' }), false);
});
