import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { ConfigurationError, ProtocolError } from '../src/errors';
import { createHttpSynthesizer } from '../src/tts/httpSynthesizer';
import { CachedSpeechResolver, cleanSpeechName, extensionFor, UnconfiguredSpeechResolver } from '../src/tts/speechCache';
import type { TTSRequest } from '../src/tts/types';

async function createResolver(defaultVoice?: string) {
  const soundsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'speech-cache-'));
  const requests: TTSRequest[] = [];
  const resolver = new CachedSpeechResolver({
    soundsDir,
    subdir: 'tts',
    defaultVoice,
    synthesizer: async (request) => {
      requests.push(request);
      return { audio: Buffer.from('RIFF'), contentType: 'audio/wav' };
    },
  });
  return { resolver, requests, directory: path.join(soundsDir, 'tts') };
}

test('cleanSpeechName lowercases, dashes spaces and drops punctuation', () => {
  assert.equal(cleanSpeechName('Hello, World! How are you?', 'en-US'), 'hello-world-how-are-you-en-us');
  assert.equal(cleanSpeechName('  Press 1  now'), 'press-1-now-default');
});

test('extensionFor maps audio content types to Asterisk formats', () => {
  assert.equal(extensionFor('audio/wav'), 'wav');
  assert.equal(extensionFor('audio/L16; rate=8000'), 'sln');
  assert.equal(extensionFor('audio/basic'), 'ulaw');
  assert.equal(extensionFor('audio/mpeg'), 'wav');
});

test('speech is synthesized once and then served from disk', async () => {
  const { resolver, requests, directory } = await createResolver();

  const first = await resolver.resolve('Hello there');
  const second = await resolver.resolve('Hello there');

  assert.equal(first, 'sound:tts/hello-there-default');
  assert.equal(second, first);
  assert.deepEqual(requests, [{ text: 'Hello there', voice: undefined }]);
  assert.deepEqual(await fs.readFile(path.join(directory, 'hello-there-default.wav')), Buffer.from('RIFF'));
});

test('concurrent requests for the same text share one synthesis', async () => {
  const { resolver, requests } = await createResolver('en-US');

  const [a, b] = await Promise.all([resolver.resolve('Welcome'), resolver.resolve('Welcome')]);

  assert.equal(a, 'sound:tts/welcome-en-us');
  assert.equal(b, a);
  assert.deepEqual(requests, [{ text: 'Welcome', voice: 'en-US' }]);
});

test('a cached file that disappeared is synthesized again', async () => {
  const { resolver, requests, directory } = await createResolver();

  await resolver.resolve('Goodbye');
  await fs.rm(path.join(directory, 'goodbye-default.wav'));
  await resolver.resolve('Goodbye');

  assert.equal(requests.length, 2);
});

test('very long text gets a generated file name', async () => {
  const { resolver } = await createResolver();

  const uri = await resolver.resolve('word '.repeat(60));

  assert.match(uri, /^sound:tts\/[0-9a-f]{32}$/);
});

test('without a TTS service speaking is a configuration error', async () => {
  await assert.rejects(new UnconfiguredSpeechResolver().resolve('Hello'), ConfigurationError);
});

test('the HTTP synthesizer posts JSON and returns the audio with its type', async () => {
  const bodies: string[] = [];
  const synthesize = createHttpSynthesizer('http://tts.test/speak', async (_input, init) => {
    bodies.push(typeof init?.body === 'string' ? init.body : '');
    return new Response(Buffer.from('RIFF'), { status: 200, headers: { 'content-type': 'audio/L16; rate=8000' } });
  });

  const result = await synthesize({ text: 'Hello', voice: 'en-US' });

  assert.deepEqual(bodies, ['{"text":"Hello","voice":"en-US"}']);
  assert.deepEqual(result, { audio: Buffer.from('RIFF'), contentType: 'audio/L16; rate=8000' });
});

test('a failing TTS service raises ProtocolError', async () => {
  const synthesize = createHttpSynthesizer('http://tts.test/speak', async () => new Response('overloaded', { status: 503 }));

  await assert.rejects(synthesize({ text: 'Hello' }), ProtocolError);
});
