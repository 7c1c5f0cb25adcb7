import { EventDispatcher } from '../src/core/EventDispatcher';
import { PendingCommands } from '../src/core/PendingCommands';
import { decodeFrame } from '../src/core/MotorProtocol';
import { ConnectionState, MotorStatusUpdate } from '../src/types';
import { DeviceError } from '../src/utils/errors';
import { flushCallbacks } from './helpers/fakeTransport';

function setup() {
  const pending = new PendingCommands();
  const dispatcher = new EventDispatcher(pending);
  const updates: MotorStatusUpdate[] = [];
  dispatcher.setStatusCallback((u) => updates.push(u));
  return { pending, dispatcher, updates };
}

describe('EventDispatcher', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
  });

  test('routes a response to its waiter', async () => {
    const { pending, dispatcher } = setup();
    const waiter = pending.register('MOVE', 1000);
    dispatcher.onFrame(decodeFrame('{"response":"MOVE","data":{"accepted":true}}'));
    await expect(waiter).resolves.toEqual({ accepted: true });
  });

  test('GET_STATUS responses are also delivered as status updates', async () => {
    const { pending, dispatcher, updates } = setup();
    const waiter = pending.register('GET_STATUS', 1000);
    dispatcher.onFrame(decodeFrame(
      '{"response":"GET_STATUS","data":{"current_pos":10,"limit_pos":100,"target_pos":10,"run_flags":0,"err_flags":0}}'
    ));
    await waiter;
    await flushCallbacks();
    expect(updates).toHaveLength(1);
    expect(updates[0]).toMatchObject({
      source: 'GET_STATUS',
      status: { current_pos: 10, limit_pos: 100, target_pos: 10, run_flags: 0, err_flags: 0 }
    });
  });

  test('ERROR response fails the oldest pending command with the code verbatim', async () => {
    const { pending, dispatcher } = setup();
    const move = pending.register('MOVE', 1000).catch((err: unknown) => err);
    const status = pending.register('GET_STATUS', 1000);
    dispatcher.onFrame(decodeFrame('{"response":"ERROR","data":{"code":102,"description":"Motor busy"}}'));

    const err = await move;
    expect(err).toBeInstanceOf(DeviceError);
    expect(err).toMatchObject({ code: 102, description: 'Motor busy', command: 'MOVE' });
    expect(pending.names()).toEqual(['GET_STATUS']);
    pending.abandonAll(new Error('done'));
    await expect(status).rejects.toThrow('done');
  });

  test('ERROR response with nothing pending becomes an error status update', async () => {
    const { dispatcher, updates } = setup();
    dispatcher.onFrame(decodeFrame('{"response":"ERROR","data":{"code":"301","description":"UART Error"}}'));
    await flushCallbacks();
    expect(updates).toHaveLength(1);
    expect(updates[0]).toMatchObject({ source: 'ERROR', errorCode: '301', description: 'UART Error', status: { err_flags: 301 } });
  });

  test('CURRENT_POS push reaches the status callback with only the fields sent', async () => {
    const { dispatcher, updates } = setup();
    dispatcher.onFrame(decodeFrame('{"event":"CURRENT_POS","data":{"current_pos":32768,"percent":50}}'));
    await flushCallbacks();
    expect(updates).toHaveLength(1);
    expect(updates[0].source).toBe('CURRENT_POS');
    expect(updates[0].status).toEqual({ current_pos: 32768 });
    expect(updates[0].percent).toBe(50);
    expect(Object.isFrozen(updates[0])).toBe(true);
  });

  test('ERROR push sets err_flags from the code', async () => {
    const { dispatcher, updates } = setup();
    dispatcher.onFrame(decodeFrame('{"event":"ERROR","data":{"code":303,"description":"Over-current error"}}'));
    await flushCallbacks();
    expect(updates[0]).toMatchObject({ source: 'ERROR', errorCode: 303, status: { err_flags: 303 } });
  });

  test('unknown events and malformed frames are dropped with a warning', async () => {
    const { dispatcher, updates } = setup();
    dispatcher.onFrame(decodeFrame('{"event":"FIRMWARE_BANNER","data":{}}'));
    dispatcher.onFrame(decodeFrame('garbage'));
    await flushCallbacks();
    expect(updates).toHaveLength(0);
    expect(dispatcher.droppedFrames).toBe(2);
    expect(warn).toHaveBeenCalledWith('[motor]', 'Unrecognized event FIRMWARE_BANNER - dropped');
  });

  test('status updates are delivered in arrival order, never inline', async () => {
    const { dispatcher, updates } = setup();
    dispatcher.onFrame(decodeFrame('{"event":"CURRENT_POS","data":{"current_pos":1}}'));
    dispatcher.onFrame(decodeFrame('{"event":"CURRENT_POS","data":{"current_pos":2}}'));
    expect(updates).toHaveLength(0);
    await flushCallbacks();
    expect(updates.map((u) => u.status.current_pos)).toEqual([1, 2]);
  });

  test('a throwing callback is logged and does not stop later deliveries', async () => {
    const { dispatcher } = setup();
    const seen: number[] = [];
    dispatcher.setStatusCallback((u) => {
      if (u.status.current_pos === 1) throw new Error('boom');
      seen.push(u.status.current_pos ?? -1);
    });
    dispatcher.onFrame(decodeFrame('{"event":"CURRENT_POS","data":{"current_pos":1}}'));
    dispatcher.onFrame(decodeFrame('{"event":"CURRENT_POS","data":{"current_pos":2}}'));
    await flushCallbacks();
    expect(seen).toEqual([2]);
    expect(warn).toHaveBeenCalledWith('[motor]', 'Error in status callback: boom');
  });

  test('connection notifications go to the current slot holder', async () => {
    const { dispatcher } = setup();
    const first = jest.fn();
    const second = jest.fn();
    dispatcher.setConnectionCallback(first);
    dispatcher.setConnectionCallback(second);
    dispatcher.notifyConnection(ConnectionState.CONNECTED);
    await flushCallbacks();
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledWith(ConnectionState.CONNECTED);
  });
});
