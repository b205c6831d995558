import { describe, expect, test, vi } from 'vitest';
import { StreamSubscriber } from '../src/sync/stream-subscriber';
import { StreamError } from '../src/errors';
import type { DeviceSnapshot } from '../src/types';
import { FakeDeviceClient, printingPayload, statusPayload } from './helpers';

function setup() {
  const client = new FakeDeviceClient();
  const subscriber = new StreamSubscriber({ client });
  const snapshots: DeviceSnapshot[] = [];
  const lost = vi.fn();
  subscriber.on('snapshot', (snapshot) => snapshots.push(snapshot));
  subscriber.on('lost', lost);
  return { client, subscriber, snapshots, lost };
}

describe('StreamSubscriber', () => {
  test('should forward decoded snapshots and skip bad ones', async () => {
    const { client, subscriber, snapshots } = setup();
    await subscriber.subscribe();
    expect(subscriber.isActive()).toBe(true);

    client.streamHandlers?.onPayload(printingPayload(4));
    client.streamHandlers?.onPayload({ status: 'Bogus' });
    client.streamHandlers?.onPayload(statusPayload('Paused'));

    expect(snapshots.map((s) => s.status)).toEqual(['printing', 'paused']);
    expect(snapshots[0].layerIndex).toBe(4);
  });

  test('should report a lost stream once and release it', async () => {
    const { client, subscriber, lost } = setup();
    await subscriber.subscribe();
    const handlers = client.streamHandlers;

    handlers?.onEnd(new StreamError('Status stream closed by device'));
    handlers?.onEnd(new StreamError('again'));
    handlers?.onPayload(printingPayload());

    expect(lost).toHaveBeenCalledTimes(1);
    expect(lost.mock.calls[0][0].message).toBe('Status stream closed by device');
    expect(client.closedStreams).toBe(1);
    expect(subscriber.isActive()).toBe(false);
  });

  test('should not report a local close as lost', async () => {
    const { client, subscriber, snapshots, lost } = setup();
    await subscriber.subscribe();
    const handlers = client.streamHandlers;

    subscriber.close();
    handlers?.onPayload(printingPayload());
    handlers?.onEnd(new StreamError('aborted'));

    expect(lost).not.toHaveBeenCalled();
    expect(snapshots).toHaveLength(0);
    expect(client.closedStreams).toBe(1);
  });

  test('should reject when the stream cannot be opened', async () => {
    const { client, subscriber, lost } = setup();
    client.streamOpenError = new Error('HTTP 404');

    await expect(subscriber.subscribe()).rejects.toThrow('HTTP 404');
    expect(subscriber.isActive()).toBe(false);
    expect(lost).not.toHaveBeenCalled();
  });

  test('should hold events received while opening until delivered', async () => {
    const { client, subscriber, snapshots } = setup();
    const open = client.openStatusStream.bind(client);
    client.openStatusStream = async (handlers) => {
      const stream = await open(handlers);
      handlers.onPayload(statusPayload('Idle'));
      handlers.onPayload(printingPayload(2));
      return stream;
    };

    await subscriber.subscribe();
    expect(snapshots).toHaveLength(0);

    subscriber.deliverPending();
    subscriber.deliverPending();
    expect(snapshots.map((s) => s.layerIndex)).toEqual([2]);
  });

  test('should discard held events when the stream ends while opening', async () => {
    const { client, subscriber, snapshots } = setup();
    const open = client.openStatusStream.bind(client);
    client.openStatusStream = async (handlers) => {
      const stream = await open(handlers);
      handlers.onPayload(printingPayload(2));
      handlers.onEnd(new StreamError('closed early'));
      return stream;
    };

    await expect(subscriber.subscribe()).rejects.toThrow(StreamError);
    subscriber.deliverPending();
    expect(snapshots).toHaveLength(0);
  });

  test('should fail the subscription when the stream ends while opening', async () => {
    const { client, subscriber, lost } = setup();
    const open = client.openStatusStream.bind(client);
    client.openStatusStream = async (handlers) => {
      const stream = await open(handlers);
      handlers.onEnd(new StreamError('closed early'));
      return stream;
    };

    await expect(subscriber.subscribe()).rejects.toThrow('Subscription was closed before it became active');
    expect(lost).not.toHaveBeenCalled();
    expect(client.closedStreams).toBe(1);
  });
});
