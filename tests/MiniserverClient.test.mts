import { test } from 'node:test';
import assert from 'node:assert/strict';
import { MockAgent } from 'undici';
import WebSocket, { WebSocketServer } from 'ws';
import { MiniserverClient, resolveConfig } from '../lib/connection/MiniserverClient.mjs';
import { ERROR_CODES, MiniserverError, TransportError } from '../lib/MiniserverProtocol.mjs';
import type { LogLevel, StateEvent } from '../lib/types.mjs';

const STRUCTURE = {
  rooms: { r1: { name: 'Kitchen' } },
  cats: {},
  controls: {
    'light-1': { name: 'Ceiling', type: 'Switch', room: 'r1', states: { active: 'light-1-active' } },
    P: { name: 'Panel', type: 'IRoomController', subControls: { S: { name: 'Slider', type: 'Slider' } } },
  },
};

interface LogLine {
  level: LogLevel;
  message: string;
}

const sleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition');
    }
    await sleep(10);
  }
}

interface HarnessOptions {
  /** Seconds until each issued token expires */
  tokenLifetime?: number;
  /** Whether the server answers pings */
  autoPong?: boolean;
  heartbeatInterval?: number;
  reconnectDelay?: number;
}

/**
 * In-process Miniserver: REST answered by a MockAgent, the streaming
 * channel by a WebSocketServer on an ephemeral port. Tokens are issued
 * as tok-1, tok-2, ...
 */
async function createHarness(options: HarnessOptions = {}) {
  const tokenLifetime = options.tokenLifetime ?? 3600;
  const wss = new WebSocketServer({
    host: '127.0.0.1',
    port: 0,
    autoPong: options.autoPong ?? true,
  });
  await new Promise<void>((resolve) => {
    wss.once('listening', () => resolve());
  });
  const address = wss.address();
  if (typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }

  const sockets: WebSocket[] = [];
  const upgradeUrls: string[] = [];
  wss.on('connection', (socket, request) => {
    sockets.push(socket);
    upgradeUrls.push(request.url ?? '');
  });

  const agent = new MockAgent();
  agent.disableNetConnect();
  const origin = `http://127.0.0.1:${address.port}`;
  const pool = agent.get(origin);

  let issued = 0;
  const keyScope = pool
    .intercept({ path: '/jdev/sys/getkey2/admin', method: 'GET' })
    .reply(200, { LL: { value: '6162', Code: '200' } });
  const tokenScope = pool
    .intercept({ path: (path: string) => path.startsWith('/jdev/sys/getjwt/'), method: 'GET' })
    .reply(200, () => {
      issued++;
      return {
        LL: {
          value: {
            token: `tok-${issued}`,
            validUntil: Math.floor(Date.now() / 1000) + tokenLifetime,
          },
        },
      };
    });
  // short-lived tokens are re-requested before every use
  if (tokenLifetime <= 300) {
    keyScope.persist();
    tokenScope.persist();
  }
  pool.intercept({ path: '/data/LoxAPP3.json', method: 'GET' }).reply(200, STRUCTURE);

  const logs: LogLine[] = [];
  const client = new MiniserverClient({
    host: '127.0.0.1',
    port: address.port,
    useTls: false,
    username: 'admin',
    password: 'test-secret',
    dispatcher: agent,
    reconnectDelay: options.reconnectDelay ?? 20,
    heartbeatInterval: options.heartbeatInterval,
    logger: (level, message) => {
      logs.push({ level, message });
    },
  });

  const events: StateEvent[] = [];
  client.registerCallback((event) => {
    events.push(event);
  });

  const close = async () => {
    await client.stop();
    for (const socket of sockets) socket.terminate();
    await new Promise<void>((resolve) => {
      wss.close(() => resolve());
    });
    await agent.close();
  };

  return { client, pool, agent, sockets, upgradeUrls, logs, events, close };
}

const warnings = (logs: LogLine[]) =>
  logs.filter((line) => line.level === 'warn').map((line) => line.message);

const messages = (logs: LogLine[]) => logs.map((line) => line.message);

test('resolveConfig: applies defaults', () => {
  const config = resolveConfig({ host: 'ms.local', username: 'admin', password: 'test-secret' });

  assert.equal(config.port, 443);
  assert.equal(config.useTls, true);
  assert.equal(config.verifySsl, true);
  assert.equal(config.permission, 2);
  assert.equal(config.clientInfo, 'miniserver-client');
  assert.equal(config.reconnectDelay, 5000);
  assert.equal(config.heartbeatInterval, 30000);
  assert.equal(resolveConfig({ host: 'h', username: 'u', password: 'p', useTls: false }).port, 80);
});

test('MiniserverClient: start authenticates, loads structure and opens the channel', async () => {
  const h = await createHarness();
  try {
    const controls = await h.client.start();

    assert.deepEqual([...controls.keys()], ['light-1', 'P', 'P/S']);
    assert.equal(controls.get('light-1')?.room, 'Kitchen');
    assert.equal(h.client.token?.token, 'tok-1');
    assert.equal(h.client.isStarted, true);
    assert.equal(h.client.isConnected, true);
    assert.equal(h.client.connectionState, 'connected');

    await waitFor(() => h.upgradeUrls.length === 1);
    assert.equal(h.upgradeUrls[0], '/ws/rfc6455?auth=tok-1');
    h.agent.assertNoPendingInterceptors();
  } finally {
    await h.close();
  }
  assert.equal(h.client.isStarted, false);
  assert.equal(h.client.isConnected, false);
});

test('MiniserverClient: concurrent and repeated start share one connection', async () => {
  const h = await createHarness();
  try {
    const [first, second] = await Promise.all([h.client.start(), h.client.start()]);
    const third = await h.client.start();

    assert.equal(first, second);
    assert.equal(first, third);

    await waitFor(() => h.sockets.length === 1);
    await sleep(50);
    assert.equal(h.sockets.length, 1);
  } finally {
    await h.close();
  }
});

test('MiniserverClient: sendCommand hits the wire path and refreshes state', async () => {
  const h = await createHarness();
  try {
    await h.client.start();
    h.pool
      .intercept({ path: '/jdev/sps/io/P/S/setValue/50', method: 'GET' })
      .reply(200, { LL: { control: 'dev/sps/io/P/S/setValue/50', value: '1', Code: '200' } });
    h.pool
      .intercept({ path: '/jdev/sps/io/P/S', method: 'GET' })
      .reply(200, { LL: { value: '50', Code: '200' } });

    await h.client.sendCommand('P/S', 'setValue', 50);

    assert.equal(h.client.getState('P/S'), '50');
    assert.deepEqual(h.events, [{ controlUuid: 'P/S', state: '', value: '50' }]);
    h.agent.assertNoPendingInterceptors();
  } finally {
    await h.close();
  }
});

test('MiniserverClient: rejected commands are logged, not raised', async () => {
  const h = await createHarness();
  try {
    await h.client.start();
    h.pool
      .intercept({ path: '/jdev/sps/io/light-1/on', method: 'GET' })
      .reply(200, { LL: { value: '0', Code: '500' } });
    h.pool.intercept({ path: '/jdev/sps/io/light-1/off', method: 'GET' }).reply(500, '');

    await h.client.sendCommand('light-1', 'on');
    await h.client.sendCommand('light-1', 'off');

    assert.deepEqual(warnings(h.logs), [
      '[MiniserverClient] Command sps/io/light-1/on returned code 500',
      '[MiniserverClient] Command sps/io/light-1/off failed with HTTP 500',
    ]);
    assert.equal(h.client.getState('light-1'), undefined);
    assert.equal(h.events.length, 0);
  } finally {
    await h.close();
  }
});

test('MiniserverClient: transport failures are raised', async () => {
  const h = await createHarness();
  try {
    await h.client.start();
    h.pool
      .intercept({ path: '/jdev/sps/io/light-1/on', method: 'GET' })
      .replyWithError(new Error('socket hang up'));

    await assert.rejects(h.client.sendCommand('light-1', 'on'), TransportError);
  } finally {
    await h.close();
  }
});

test('MiniserverClient: frames from the channel reach listeners and the cache', async () => {
  const h = await createHarness();
  try {
    await h.client.start();
    await waitFor(() => h.sockets.length === 1);

    h.sockets[0]?.send(JSON.stringify({ 'light-1-active': true, 'light-1': 1, unknown: 5 }));
    await waitFor(() => h.events.length === 2);

    assert.deepEqual(h.events, [
      { controlUuid: 'light-1', state: 'active', value: true },
      { controlUuid: 'light-1', state: '', value: 1 },
    ]);
    assert.equal(h.client.getState('light-1', 'active'), true);
  } finally {
    await h.close();
  }
});

test('MiniserverClient: updateState keeps the cached value on failure', async () => {
  const h = await createHarness();
  try {
    await h.client.start();
    await waitFor(() => h.sockets.length === 1);
    h.sockets[0]?.send(JSON.stringify({ 'light-1': 1 }));
    await waitFor(() => h.events.length === 1);

    h.pool.intercept({ path: '/jdev/sps/io/light-1', method: 'GET' }).reply(503, '');

    assert.equal(await h.client.updateState('light-1'), 1);
    assert.deepEqual(warnings(h.logs), [
      '[MiniserverClient] Unable to refresh state for control light-1: HTTP 503',
    ]);
  } finally {
    await h.close();
  }
});

test('MiniserverClient: reconnects after the channel drops and keeps cached state', async () => {
  const h = await createHarness();
  try {
    await h.client.start();
    await waitFor(() => h.sockets.length === 1);
    h.sockets[0]?.send(JSON.stringify({ 'light-1': 1 }));
    await waitFor(() => h.events.length === 1);

    h.sockets[0]?.terminate();

    await waitFor(() => h.sockets.length === 2 && h.client.isConnected);
    assert.equal(h.upgradeUrls[1], '/ws/rfc6455?auth=tok-1');
    assert.equal(h.client.getState('light-1'), 1);
    assert.ok(
      warnings(h.logs).includes('[MiniserverClient] Channel closed unexpectedly (1006: No reason)')
    );
  } finally {
    await h.close();
  }
});

test('MiniserverClient: updateState falls back to the whole payload without a value', async () => {
  const h = await createHarness();
  try {
    await h.client.start();
    h.pool
      .intercept({ path: '/jdev/sps/io/light-1', method: 'GET' })
      .reply(200, { LL: { Code: '200' } });

    const value = await h.client.updateState('light-1');

    assert.deepEqual(value, { LL: { Code: '200' } });
    assert.deepEqual(h.client.getState('light-1'), { LL: { Code: '200' } });
  } finally {
    await h.close();
  }
});

test('MiniserverClient: reconnect re-authenticates when the token is expiring', async () => {
  const h = await createHarness({ tokenLifetime: 200 });
  try {
    await h.client.start();
    await waitFor(() => h.sockets.length === 1);
    // start authenticates before the token check, the structure load and the channel open
    assert.equal(h.upgradeUrls[0], '/ws/rfc6455?auth=tok-3');

    h.sockets[0]?.terminate();
    await waitFor(() => h.sockets.length === 2 && h.client.isConnected);

    assert.equal(h.upgradeUrls[1], '/ws/rfc6455?auth=tok-4');
    assert.equal(h.client.token?.token, 'tok-4');
  } finally {
    await h.close();
  }
});

test('MiniserverClient: stop cancels a pending reconnect', async () => {
  const h = await createHarness({ reconnectDelay: 200 });
  try {
    await h.client.start();
    await waitFor(() => h.sockets.length === 1);

    h.sockets[0]?.terminate();
    await waitFor(() => messages(h.logs).includes('[MiniserverClient] Reconnecting in 200 ms'));
    await h.client.stop();
    await sleep(300);

    assert.equal(h.sockets.length, 1);
    assert.equal(h.client.isConnected, false);
    assert.equal(h.client.connectionState, 'disconnected');
  } finally {
    await h.close();
  }
});

test('MiniserverClient: unanswered heartbeat drops the channel and reconnects', async () => {
  const h = await createHarness({ autoPong: false, heartbeatInterval: 20 });
  try {
    await h.client.start();

    await waitFor(() => h.sockets.length >= 2);

    assert.ok(
      warnings(h.logs).includes(
        '[ConnectionManager] No pong within heartbeat interval, dropping channel'
      )
    );
    assert.ok(
      warnings(h.logs).includes('[MiniserverClient] Channel closed unexpectedly (1006: No reason)')
    );
  } finally {
    await h.close();
  }
});

test('MiniserverClient: answered heartbeat keeps the channel open', async () => {
  const h = await createHarness({ heartbeatInterval: 20 });
  try {
    await h.client.start();
    await sleep(150);

    assert.equal(h.sockets.length, 1);
    assert.equal(h.client.isConnected, true);
  } finally {
    await h.close();
  }
});

test('MiniserverClient: stop is idempotent and commands need a started client', async () => {
  const h = await createHarness();
  try {
    await h.client.start();
    await h.client.stop();
    await h.client.stop();

    assert.equal(h.client.getState('light-1'), undefined);
    await assert.rejects(h.client.sendCommand('light-1', 'on'), (error: unknown) => {
      assert.ok(error instanceof MiniserverError);
      assert.equal(error.code, ERROR_CODES.NOT_STARTED);
      return true;
    });
  } finally {
    await h.close();
  }
});

test('MiniserverClient: stop before start is a no-op', async () => {
  const h = await createHarness();
  try {
    await h.client.stop();
    assert.equal(h.client.isStarted, false);
  } finally {
    await h.close();
  }
});
