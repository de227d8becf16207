import type { Writable } from 'stream';
import { encodeEvent, OVERFLOW_EVENT_TYPE, type StageEvent } from './protocol.ts';

/**
 * How long an overflowed subscriber may take to flush its closing record
 * before its connection is destroyed outright.
 */
const OVERFLOW_CLOSE_GRACE_MS = 5000;

export interface EventHubOptions {
  /** Lines a subscriber may have queued (not yet accepted by its sink). */
  queueLimit: number;
  debug?: boolean;
  /** Notified whenever a subscriber attaches or detaches. */
  onSubscriberCountChange?: (count: number) => void;
}

type SubscriberState = 'open' | 'closing' | 'closed';

/**
 * One attached stream consumer. Owns a bounded outbound queue so a stalled
 * consumer never holds up publication to anyone else.
 */
export class Subscriber {
  private queue: string[] = [];
  private waitingForDrain = false;
  private state: SubscriberState = 'open';
  private delivered = 0;

  constructor(
    readonly id: number,
    private readonly sink: Writable,
    private readonly queueLimit: number,
    private readonly onDetach: (subscriber: Subscriber) => void,
    private readonly debug = false,
  ) {
    sink.on('close', () => this.teardown('connection closed'));
    sink.on('error', (error: NodeJS.ErrnoException) => {
      if (this.debug && error.code !== 'ECONNRESET' && error.code !== 'EPIPE') {
        console.error(`[HUB] Subscriber ${this.id} error:`, error);
      }
      this.teardown('connection error');
    });
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  get queued(): number {
    return this.queue.length;
  }

  get deliveredCount(): number {
    return this.delivered;
  }

  /**
   * Queue an encoded line. Closes the subscriber with an overflow record when
   * the queue is full.
   */
  enqueue(line: string): void {
    if (this.state !== 'open') return;
    if (this.queue.length >= this.queueLimit) {
      this.overflow();
      return;
    }
    this.queue.push(line);
    this.flush();
  }

  /** Flush whatever is queued, then end the stream cleanly. */
  close(): void {
    if (this.state !== 'open') return;
    this.state = 'closing';
    this.flush();
  }

  private flush(): void {
    while (!this.waitingForDrain && !this.sinkGone()) {
      const line = this.queue.shift();
      if (line === undefined) break;
      this.delivered++;
      if (!this.sink.write(line)) {
        this.waitingForDrain = true;
        this.sink.once('drain', () => {
          this.waitingForDrain = false;
          this.flush();
        });
      }
    }

    if (this.state === 'closing' && this.queue.length === 0 && !this.waitingForDrain) {
      this.sink.end();
      this.teardown('stream closed');
    }
  }

  private overflow(): void {
    const dropped = this.queue.length + 1;
    this.queue = [];
    console.warn(
      `[HUB] Subscriber ${this.id} exceeded queue limit ${this.queueLimit}; closing its stream`,
    );
    if (!this.sinkGone()) {
      this.sink.end(encodeEvent({ type: OVERFLOW_EVENT_TYPE, limit: this.queueLimit, dropped }));
      const timer = setTimeout(() => this.sink.destroy(), OVERFLOW_CLOSE_GRACE_MS);
      timer.unref();
      this.sink.once('close', () => clearTimeout(timer));
    }
    this.teardown('overflow');
  }

  private sinkGone(): boolean {
    return this.sink.destroyed || this.sink.writableEnded;
  }

  private teardown(reason: string): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.queue = [];
    if (this.debug) {
      console.log(`[HUB] Subscriber ${this.id} detached (${reason}, ${this.delivered} delivered)`);
    }
    this.onDetach(this);
  }
}

/**
 * Daemon-side fan-out of engine events to every attached subscriber.
 *
 * Publication is single-writer and synchronous: each event is encoded once
 * and queued on every subscriber attached at that moment. Subscribers only
 * ever see events published after they attached.
 */
export class EventHub {
  private readonly subscribers = new Map<number, Subscriber>();
  private nextSubscriberId = 1;
  private published = 0;
  private accepting = true;

  constructor(private readonly options: EventHubOptions) {}

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  get publishedCount(): number {
    return this.published;
  }

  /**
   * Throws for an event using the reserved overflow type, which consumers
   * would read as their stream being dropped.
   */
  publish(event: StageEvent): void {
    if (event.type === OVERFLOW_EVENT_TYPE) {
      throw new Error(`Event type "${OVERFLOW_EVENT_TYPE}" is reserved for stream control records`);
    }
    const line = encodeEvent(event);
    this.published++;
    for (const subscriber of Array.from(this.subscribers.values())) {
      subscriber.enqueue(line);
    }
  }

  /**
   * Attach a stream sink. The caller keeps ownership of any headers it has
   * already written; the hub only writes event lines and ends the sink.
   */
  attach(sink: Writable): Subscriber {
    if (!this.accepting) {
      throw new Error('Event hub is shutting down');
    }
    const subscriber = new Subscriber(
      this.nextSubscriberId++,
      sink,
      this.options.queueLimit,
      (s) => this.detach(s),
      this.options.debug,
    );
    this.subscribers.set(subscriber.id, subscriber);
    if (this.options.debug) {
      console.log(`[HUB] Subscriber ${subscriber.id} attached (${this.subscribers.size} total)`);
    }
    this.options.onSubscriberCountChange?.(this.subscribers.size);
    return subscriber;
  }

  /**
   * End every current stream cleanly once its queue has flushed. New
   * subscribers may still attach afterwards.
   */
  closeStreams(): void {
    for (const subscriber of Array.from(this.subscribers.values())) {
      subscriber.close();
    }
  }

  /**
   * Refuse new subscribers and close existing ones cleanly.
   */
  shutdown(): void {
    this.accepting = false;
    this.closeStreams();
  }

  private detach(subscriber: Subscriber): void {
    if (!this.subscribers.delete(subscriber.id)) return;
    this.options.onSubscriberCountChange?.(this.subscribers.size);
  }
}
