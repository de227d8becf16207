import http from 'http';
import {
  decodeEventStream,
  NDJSON_CONTENT_TYPE,
  OVERFLOW_EVENT_TYPE,
  overflowRecordSchema,
  STREAM_PATH,
  type StageEvent,
} from './protocol.ts';
import {
  DaemonUnreachableError,
  StageHubError,
  StreamIOError,
  SubscriberOverflowError,
} from './errors.ts';
import { getConfig } from '../config.ts';

/**
 * How a read ended without error: the daemon closed the stream, or the
 * caller's signal aborted it.
 */
export type StreamOutcome = 'ended' | 'cancelled';

/**
 * Receives each decoded event in arrival order. A returned promise is awaited
 * before the next event is read.
 */
export type EventHandler = (event: StageEvent) => void | Promise<void>;

export interface ReadStreamOptions {
  onEvent: EventHandler;
  signal?: AbortSignal;
  /** Longest accepted line (defaults to config). */
  maxLineBytes?: number;
  debug?: boolean;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Issue the stream request and wait for a 200 response. Anything that fails
 * before then is a connection failure.
 */
function openStream(address: string, signal?: AbortSignal): Promise<http.IncomingMessage> {
  return new Promise((resolve, reject) => {
    const req = http.get(
      `http://${address}${STREAM_PATH}`,
      {
        signal,
        agent: false,
        headers: { accept: NDJSON_CONTENT_TYPE },
      },
      (res) => {
        if (res.statusCode !== 200) {
          res.resume();
          req.destroy();
          reject(new Error(`Unexpected response status ${res.statusCode ?? 'unknown'}`));
          return;
        }
        resolve(res);
      },
    );
    // Also absorbs errors raised after the response arrived; those surface
    // through the response stream instead.
    req.on('error', reject);
  });
}

/**
 * Attach to a daemon's event stream and deliver each event to `onEvent`
 * until the daemon closes the stream or the signal aborts.
 *
 * Throws DaemonUnreachableError if the connection cannot be established,
 * OversizedLineError for a line over the limit, SubscriberOverflowError when
 * the daemon dropped this consumer, and StreamIOError for any other fault on
 * the established stream. Malformed lines are skipped.
 */
export async function readStream(address: string, options: ReadStreamOptions): Promise<StreamOutcome> {
  const { signal, onEvent, debug } = options;
  const maxLineBytes = options.maxLineBytes ?? getConfig().maxLineBytes;

  if (signal?.aborted) return 'cancelled';

  let res: http.IncomingMessage;
  try {
    res = await openStream(address, signal);
  } catch (error) {
    if (signal?.aborted) return 'cancelled';
    throw new DaemonUnreachableError(address, 1, error);
  }

  if (debug) console.log(`[STREAM] Attached to ${address}`);

  let malformed = 0;
  let handlerFailure: { error: unknown } | undefined;
  const events = decodeEventStream(res, {
    maxLineBytes,
    onMalformed: (line) => {
      malformed++;
      if (debug) console.log(`[STREAM] Skipping malformed line: ${line.slice(0, 120)}`);
    },
  });

  try {
    for await (const event of events) {
      if (event.type === OVERFLOW_EVENT_TYPE) {
        const overflow = overflowRecordSchema.safeParse(event);
        if (overflow.success) {
          throw new SubscriberOverflowError(overflow.data.limit, overflow.data.dropped);
        }
      }

      try {
        const result = onEvent(event);
        if (isPromiseLike(result)) await result;
      } catch (error) {
        handlerFailure = { error };
        break;
      }

      if (signal?.aborted) break;
    }
  } catch (error) {
    if (signal?.aborted) return 'cancelled';
    if (error instanceof StageHubError) throw error;
    throw new StreamIOError(address, error);
  } finally {
    res.destroy();
    if (debug && malformed > 0) {
      console.log(`[STREAM] Skipped ${malformed} malformed line(s) from ${address}`);
    }
  }

  if (handlerFailure) throw handlerFailure.error;
  if (signal?.aborted) return 'cancelled';

  if (debug) console.log(`[STREAM] Stream from ${address} ended`);
  return 'ended';
}
