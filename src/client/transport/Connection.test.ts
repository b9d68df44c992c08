import WebSocket, { WebSocketServer } from 'ws';
import { ConnectError, TimeoutError } from '../../errors';
import { Connection, TransportEvent } from './Connection';

/**
 * Starts an in-process WebSocket server on a random local port.
 */
async function startServer(options: { autoPong?: boolean } = {}): Promise<{ server: WebSocketServer; url: string }> {
  const server = new WebSocketServer({ port: 0, host: '127.0.0.1', autoPong: options.autoPong ?? true });
  await new Promise<void>(resolve => server.once('listening', () => resolve()));
  const address = server.address();
  if (typeof address !== 'object' || address === null) {
    throw new Error('Test server did not bind to a TCP port');
  }
  return { server, url: `ws://127.0.0.1:${address.port}` };
}

function stopServer(server: WebSocketServer): Promise<void> {
  server.clients.forEach(client => client.terminate());
  return new Promise(resolve => server.close(() => resolve()));
}

function nextClient(server: WebSocketServer): Promise<WebSocket> {
  return new Promise(resolve => server.once('connection', socket => resolve(socket)));
}

async function collect(connection: Connection): Promise<TransportEvent[]> {
  const events: TransportEvent[] = [];
  for await (const event of connection.events()) {
    events.push(event);
  }
  return events;
}

describe('Connection', () => {
  let server: WebSocketServer | undefined;
  let url: string;

  afterEach(async () => {
    if (server) {
      await stopServer(server);
      server = undefined;
    }
  });

  it('should deliver inbound text frames in order and end when the server closes', async () => {
    const started = await startServer();
    ({ server, url } = started);
    const accepted = nextClient(started.server);

    const connection = await Connection.connect(url, { pingIntervalMs: 60_000 });
    const peer = await accepted;
    const received = collect(connection);

    peer.send('{"m":3,"i":0,"n":"A","o":"{}"}');
    peer.send('{"m":3,"i":0,"n":"B","o":"{}"}');
    peer.close();

    expect(await received).toEqual([
      { type: 'frame', data: '{"m":3,"i":0,"n":"A","o":"{}"}' },
      { type: 'frame', data: '{"m":3,"i":0,"n":"B","o":"{}"}' },
    ]);
    expect(connection.isOpen).toBe(false);
  });

  it('should send frames to the server', async () => {
    const started = await startServer();
    ({ server, url } = started);
    const accepted = nextClient(started.server);

    const connection = await Connection.connect(url, { pingIntervalMs: 60_000 });
    const peer = await accepted;
    const message = new Promise<string>(resolve => peer.once('message', data => resolve(data.toString())));

    connection.send('{"m":0,"i":2,"n":"GetProducts","o":"{}"}');

    expect(await message).toBe('{"m":0,"i":2,"n":"GetProducts","o":"{}"}');
    connection.close();
  });

  it('should end the inbound sequence immediately on close and tolerate repeated close', async () => {
    ({ server, url } = await startServer());

    const connection = await Connection.connect(url, { pingIntervalMs: 60_000 });
    const received = collect(connection);

    connection.close();
    connection.close();

    expect(await received).toEqual([]);
    expect(connection.isOpen).toBe(false);
    expect(() => connection.send('{}')).toThrow(ConnectError);
  });

  it('should reject with ConnectError when nothing is listening', async () => {
    const probe = await startServer();
    const closedUrl = probe.url;
    await stopServer(probe.server);

    await expect(Connection.connect(closedUrl)).rejects.toBeInstanceOf(ConnectError);
  });

  it('should end with a keep-alive timeout when pongs stop arriving', async () => {
    ({ server, url } = await startServer({ autoPong: false }));

    const connection = await Connection.connect(url, { pingIntervalMs: 20, pongTimeoutMs: 40 });
    const events = await collect(connection);

    expect(events).toHaveLength(1);
    const [last] = events;
    expect(last.type).toBe('timeout');
    if (last.type === 'timeout') {
      expect(last.error).toBeInstanceOf(TimeoutError);
      expect(last.error.scope).toBe('keepalive');
    }
    expect(connection.isOpen).toBe(false);
  });

  it('should stay open while pongs keep arriving', async () => {
    ({ server, url } = await startServer());

    const connection = await Connection.connect(url, { pingIntervalMs: 10, pongTimeoutMs: 200 });
    await new Promise(resolve => setTimeout(resolve, 120));

    expect(connection.isOpen).toBe(true);
    connection.close();
  });
});
