import { Session, SessionHandlers } from '../src/core/Session';
import { DisconnectReason } from '../src/types';
import { FakeTransport } from './helpers/fakeTransport';

function openSession(transport = new FakeTransport('accept')) {
  const lines: string[] = [];
  const closed: Array<{ reason: DisconnectReason; detail?: string }> = [];
  const handlers: SessionHandlers = {
    onLine: (line) => lines.push(line),
    onClosed: (reason, detail) => closed.push({ reason, detail })
  };
  const session = new Session(transport, { host: '127.0.0.1', port: 17002, connectTimeoutMs: 1000 }, handlers, 7);
  return { session, transport, lines, closed };
}

describe('Session basics', () => {
  test('open, send and close', async () => {
    const { session, transport } = openSession();
    await session.open();
    expect(transport.connectedTo).toEqual({ host: '127.0.0.1', port: 17002, timeoutMs: 1000 });

    session.send('{"cmd":"STOP","params":{}}\n');
    expect(transport.written).toEqual(['{"cmd":"STOP","params":{}}\n']);
    expect(session.lastSentTime).toBeGreaterThan(0);

    session.close();
    expect(session.isOpen).toBe(false);
    expect(transport.closed).toBe(true);
    expect(() => session.send('x\n')).toThrow('Session 7 is closed');
  });

  test('delivers complete lines across chunks', async () => {
    const { session, transport, lines } = openSession();
    await session.open();
    transport.receiveRaw('{"event":"CURRENT_POS",');
    expect(lines).toEqual([]);
    transport.receiveRaw('"data":{}}\n{"response":"STOP"}\n');
    expect(lines).toEqual(['{"event":"CURRENT_POS","data":{}}', '{"response":"STOP"}']);
  });

  test('reports the first close only', async () => {
    const { session, transport, closed } = openSession();
    await session.open();
    transport.end();
    expect(closed).toEqual([{ reason: DisconnectReason.REMOTE_CLOSED, detail: undefined }]);
  });

  test('socket errors carry their message', async () => {
    const { session, transport, closed } = openSession();
    await session.open();
    transport.fail(new Error('read ECONNRESET'));
    expect(closed).toEqual([{ reason: DisconnectReason.SOCKET_ERROR, detail: 'read ECONNRESET' }]);
  });

  test('a locally closed session reports nothing and drops further data', async () => {
    const { session, transport, lines, closed } = openSession();
    await session.open();
    session.close();
    transport.receiveRaw('{"response":"STOP"}\n');
    transport.end();
    expect(lines).toEqual([]);
    expect(closed).toEqual([]);
  });

  test('open fails when the transport refuses', async () => {
    const { session } = openSession(new FakeTransport('refuse'));
    await expect(session.open()).rejects.toThrow('ECONNREFUSED');
  });
});
