import { describe, it, expect, afterEach, vi } from 'vitest';
import { PassThrough, type Readable } from 'stream';
import { EventHub } from '../../src/daemon/hub.ts';
import { encodeEvent } from '../../src/daemon/protocol.ts';
import { waitFor } from '../test-helper.ts';

async function readAll(stream: Readable): Promise<string> {
  let out = '';
  for await (const chunk of stream) {
    out += String(chunk);
  }
  return out;
}

describe('EventHub', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delivers events published after attach, in order', async () => {
    const hub = new EventHub({ queueLimit: 8 });
    hub.publish({ type: 'before' });

    const sink = new PassThrough();
    hub.attach(sink);
    hub.publish({ type: 'progress', pct: 50 });
    hub.publish({ type: 'done' });
    hub.closeStreams();

    expect(await readAll(sink)).toBe(
      '{"type":"progress","pct":50}\n{"type":"done"}\n',
    );
    expect(hub.publishedCount).toBe(3);
    expect(hub.subscriberCount).toBe(0);
  });

  it('fans every event out to each subscriber', async () => {
    const hub = new EventHub({ queueLimit: 8 });
    const a = new PassThrough();
    const b = new PassThrough();
    hub.attach(a);
    hub.publish({ type: 'one' });
    hub.attach(b);
    hub.publish({ type: 'two' });
    hub.closeStreams();

    expect(await readAll(a)).toBe('{"type":"one"}\n{"type":"two"}\n');
    expect(await readAll(b)).toBe('{"type":"two"}\n');
  });

  it('waits for a slow sink to drain instead of dropping events', async () => {
    const hub = new EventHub({ queueLimit: 10 });
    const sink = new PassThrough({ highWaterMark: 1 });
    const subscriber = hub.attach(sink);

    hub.publish({ type: 'a' });
    hub.publish({ type: 'b' });
    hub.publish({ type: 'c' });
    expect(subscriber.queued).toBe(2);

    hub.closeStreams();
    expect(await readAll(sink)).toBe('{"type":"a"}\n{"type":"b"}\n{"type":"c"}\n');
    expect(subscriber.deliveredCount).toBe(3);
  });

  it('closes an overflowing subscriber with an overflow record without affecting others', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const hub = new EventHub({ queueLimit: 2 });
    const slow = new PassThrough({ highWaterMark: 1 });
    const fast = new PassThrough();
    const slowSubscriber = hub.attach(slow);
    hub.attach(fast);

    for (const type of ['e1', 'e2', 'e3', 'e4']) {
      hub.publish({ type });
    }

    expect(slowSubscriber.isOpen).toBe(false);
    expect(hub.subscriberCount).toBe(1);
    expect(warn).toHaveBeenCalledWith(
      `[HUB] Subscriber ${slowSubscriber.id} exceeded queue limit 2; closing its stream`,
    );

    hub.publish({ type: 'e5' });
    hub.closeStreams();

    expect(await readAll(slow)).toBe(
      encodeEvent({ type: 'e1' }) + '{"type":"stream.overflow","limit":2,"dropped":3}\n',
    );
    expect(await readAll(fast)).toBe(
      ['e1', 'e2', 'e3', 'e4', 'e5'].map((type) => encodeEvent({ type })).join(''),
    );
  });

  it('detaches a subscriber whose connection goes away', async () => {
    const counts: number[] = [];
    const hub = new EventHub({
      queueLimit: 8,
      onSubscriberCountChange: (count) => counts.push(count),
    });
    const a = new PassThrough();
    const b = new PassThrough();
    hub.attach(a);
    hub.attach(b);

    a.destroy();
    await waitFor(() => hub.subscriberCount === 1, 1000, 'detach');
    hub.publish({ type: 'after' });
    hub.closeStreams();

    expect(await readAll(b)).toBe('{"type":"after"}\n');
    expect(counts).toEqual([1, 2, 1, 0]);
  });

  it('keeps accepting subscribers after closeStreams but not after shutdown', async () => {
    const hub = new EventHub({ queueLimit: 8 });
    hub.attach(new PassThrough());
    hub.closeStreams();

    const later = new PassThrough();
    hub.attach(later);
    hub.publish({ type: 'next' });

    hub.shutdown();
    expect(await readAll(later)).toBe('{"type":"next"}\n');
    expect(() => hub.attach(new PassThrough())).toThrow('Event hub is shutting down');
  });

  it('refuses events using the reserved overflow type', async () => {
    const hub = new EventHub({ queueLimit: 8 });
    const sink = new PassThrough();
    hub.attach(sink);

    expect(() => hub.publish({ type: 'stream.overflow', limit: 1, dropped: 1 })).toThrow(
      'Event type "stream.overflow" is reserved for stream control records',
    );
    hub.publish({ type: 'ok' });
    hub.closeStreams();

    expect(await readAll(sink)).toBe('{"type":"ok"}\n');
    expect(hub.publishedCount).toBe(1);
  });

  it('counts events published with nobody attached', () => {
    const hub = new EventHub({ queueLimit: 8 });
    hub.publish({ type: 'ignored' });
    hub.publish({ type: 'ignored' });
    expect(hub.publishedCount).toBe(2);
    expect(hub.subscriberCount).toBe(0);
  });
});
