import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { SessionKind } from '../src/calls/types';
import { buildHttpServer } from '../src/httpServer';

test('health reports readiness and live sessions per kind', async () => {
  const source = {
    isServing: false,
    registry: { count: (kind: SessionKind) => (kind === 'voice' ? 2 : 1) },
  };
  const { server } = buildHttpServer(source);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('http server did not bind a TCP port');
  }
  const { port } = address;

  try {
    const starting = await fetch(`http://127.0.0.1:${port}/health`, { headers: { 'x-request-id': 'req-test' } });
    assert.equal(starting.status, 503);
    assert.equal(starting.headers.get('x-request-id'), 'req-test');
    assert.deepEqual(await starting.json(), { status: 'starting', sessions: { voice: 2, text: 1 } });

    source.isServing = true;
    const ready = await fetch(`http://127.0.0.1:${port}/health`);
    assert.equal(ready.status, 200);
    assert.deepEqual(await ready.json(), { status: 'ok', sessions: { voice: 2, text: 1 } });
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
});
