import { describe, it, expect, vi } from 'vitest';
import { setImmediate as yieldToLoop } from 'timers/promises';
import { ReceiverLoop, type DatagramHandler } from './receiver-loop.js';
import { StartupError } from '../utils/errors.js';
import { FakeSocket, FAKE_REMOTE } from '../test-utils/fake-socket.js';

function createLoop(handler: DatagramHandler, socket = new FakeSocket()) {
  const loop = new ReceiverLoop({
    name: 'test',
    host: '127.0.0.1',
    port: 5005,
    handler,
    socketFactory: () => socket
  });
  return { loop, socket };
}

describe('ReceiverLoop', () => {
  it('hands each datagram to the handler in order', async () => {
    const seen: string[] = [];
    const { loop, socket } = createLoop((datagram) => {
      seen.push(Buffer.from(datagram).toString('utf8'));
      return null;
    });

    await loop.start();
    await socket.deliver('one');
    await socket.deliver('two');
    await loop.stop();

    expect(seen).toEqual(['one', 'two']);
    expect(loop.getStats().received).toBe(2);
  });

  it('queues datagrams emitted back to back', async () => {
    const seen: string[] = [];
    const { loop, socket } = createLoop((datagram) => {
      seen.push(Buffer.from(datagram).toString('utf8'));
      return null;
    });

    await loop.start();
    socket.emit('message', Buffer.from('first'), FAKE_REMOTE);
    socket.emit('message', Buffer.from('second'), FAKE_REMOTE);
    socket.emit('message', Buffer.from('third'), FAKE_REMOTE);
    await yieldToLoop();
    await loop.stop();

    expect(seen).toEqual(['first', 'second', 'third']);
  });

  it('sends handler replies back to the sender', async () => {
    const { loop, socket } = createLoop(() => 'pong');

    await loop.start();
    await socket.deliver('ping');
    await loop.stop();

    expect(socket.replies()).toEqual(['pong']);
    expect(socket.sent[0].port).toBe(40000);
    expect(socket.sent[0].address).toBe('127.0.0.1');
  });

  it('keeps running after a handler throws', async () => {
    const handler = vi.fn<DatagramHandler>()
      .mockImplementationOnce(() => {
        throw new Error('boom');
      })
      .mockReturnValue(null);
    const { loop, socket } = createLoop(handler);

    await loop.start();
    await socket.deliver('bad');
    await socket.deliver('good');
    await loop.stop();

    expect(handler).toHaveBeenCalledTimes(2);
    expect(loop.getStats().failed).toBe(1);
    expect(loop.getStats().received).toBe(2);
  });

  it('keeps running after a socket error', async () => {
    const seen: string[] = [];
    const { loop, socket } = createLoop((datagram) => {
      seen.push(Buffer.from(datagram).toString('utf8'));
      return null;
    });

    await loop.start();
    socket.emit('error', new Error('ECONNREFUSED'));
    await yieldToLoop();
    await socket.deliver('after');
    await loop.stop();

    expect(seen).toEqual(['after']);
    expect(loop.getStats().transportErrors).toBe(1);
  });

  it('unblocks the pending receive on stop and closes the socket once', async () => {
    const { loop, socket } = createLoop(() => null);

    await loop.start();
    expect(loop.isRunning()).toBe(true);

    await loop.stop();
    await loop.stop();

    expect(loop.isRunning()).toBe(false);
    expect(socket.closeCount).toBe(1);
    expect(socket.listenerCount('message')).toBe(0);
  });

  it('ignores datagrams after stop', async () => {
    const handler = vi.fn<DatagramHandler>().mockReturnValue(null);
    const { loop, socket } = createLoop(handler);

    await loop.start();
    await loop.stop();
    await socket.deliver('late');

    expect(handler).not.toHaveBeenCalled();
  });

  it('releases the socket when stopped while still binding', async () => {
    const { loop, socket } = createLoop(() => null);

    const starting = loop.start();
    await loop.stop();
    await starting;

    expect(loop.isRunning()).toBe(false);
    expect(socket.closeCount).toBe(1);
    expect(socket.listenerCount('message')).toBe(0);
  });

  it('stops cleanly while a failing start is in flight', async () => {
    const socket = new FakeSocket();
    socket.bindError = new Error('EADDRINUSE');
    const { loop } = createLoop(() => null, socket);

    const failed = expect(loop.start()).rejects.toBeInstanceOf(StartupError);
    await loop.stop();

    await failed;
    expect(socket.closeCount).toBe(1);
  });

  it('fails to start with a StartupError when the socket cannot bind', async () => {
    const socket = new FakeSocket();
    socket.bindError = new Error('EADDRINUSE');
    const { loop } = createLoop(() => null, socket);

    await expect(loop.start()).rejects.toBeInstanceOf(StartupError);
    expect(socket.closeCount).toBe(1);
    expect(loop.isRunning()).toBe(false);
  });
});
