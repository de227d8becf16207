import { z } from 'zod';
import { OversizedLineError } from './errors.ts';

/**
 * A deployment event as carried on the stream: a string `type` discriminator
 * plus opaque payload fields defined by the engine that produced it.
 */
export interface StageEvent {
  type: string;
  [field: string]: unknown;
}

export const stageEventSchema = z
  .object({
    type: z.string().min(1),
  })
  .passthrough();

/**
 * Control record the hub writes before closing a subscriber that fell too far
 * behind. It is never delivered to event handlers.
 */
export const OVERFLOW_EVENT_TYPE = 'stream.overflow';

export const overflowRecordSchema = z.object({
  type: z.literal(OVERFLOW_EVENT_TYPE),
  limit: z.number().int().nonnegative(),
  dropped: z.number().int().nonnegative(),
});

export type OverflowRecord = z.infer<typeof overflowRecordSchema>;

export const STREAM_PATH = '/stream';
export const STATUS_PATH = '/status';
export const NDJSON_CONTENT_TYPE = 'application/x-ndjson';

/**
 * Encode one event as a newline-terminated JSON line.
 */
export function encodeEvent(event: StageEvent | OverflowRecord): string {
  return JSON.stringify(event) + '\n';
}

/**
 * Decode one line into an event. Returns undefined for anything that is not a
 * JSON object with a non-empty string `type`.
 */
export function parseEventLine(line: string): StageEvent | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = stageEventSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export interface DecodeOptions {
  /** Longest accepted line in bytes, excluding the terminator. */
  maxLineBytes: number;
  /** Called for each line that failed to decode. */
  onMalformed?: (line: string) => void;
}

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

function decodeLine(bytes: Buffer, options: DecodeOptions): StageEvent | undefined {
  const end = bytes.length > 0 && bytes[bytes.length - 1] === CARRIAGE_RETURN ? -1 : undefined;
  const text = bytes.subarray(0, end).toString('utf8');
  if (!text.trim()) return undefined;
  const event = parseEventLine(text);
  if (!event) options.onMalformed?.(text);
  return event;
}

/**
 * Lazily decode a byte stream of newline-delimited JSON into events.
 *
 * Malformed lines are filtered out. A line longer than `maxLineBytes` throws
 * OversizedLineError; errors raised by the source propagate unchanged. A final
 * unterminated line is decoded when the source ends.
 */
export async function* decodeEventStream(
  source: AsyncIterable<Buffer | string>,
  options: DecodeOptions,
): AsyncGenerator<StageEvent, void, undefined> {
  const { maxLineBytes } = options;
  // Unterminated tail of the current line, joined only once the line ends.
  let parts: Buffer[] = [];
  let pendingBytes = 0;

  const takeLine = (last: Buffer): Buffer => {
    const line = parts.length === 0 ? last : Buffer.concat([...parts, last], pendingBytes + last.length);
    parts = [];
    pendingBytes = 0;
    return line;
  };

  for await (const chunk of source) {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;

    let start = 0;
    let newlineIndex = bytes.indexOf(NEWLINE, start);
    while (newlineIndex !== -1) {
      const lineBytes = pendingBytes + (newlineIndex - start);
      if (lineBytes > maxLineBytes) {
        throw new OversizedLineError(lineBytes, maxLineBytes);
      }
      const event = decodeLine(takeLine(bytes.subarray(start, newlineIndex)), options);
      start = newlineIndex + 1;
      if (event) yield event;
      newlineIndex = bytes.indexOf(NEWLINE, start);
    }

    if (start < bytes.length) {
      parts.push(bytes.subarray(start));
      pendingBytes += bytes.length - start;
      if (pendingBytes > maxLineBytes) {
        throw new OversizedLineError(pendingBytes, maxLineBytes);
      }
    }
  }

  if (pendingBytes > 0) {
    const event = decodeLine(takeLine(Buffer.alloc(0)), options);
    if (event) yield event;
  }
}
