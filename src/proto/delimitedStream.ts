/**
 * Length-delimited message framing, as written by Firehose for CloudWatch
 * metric streams: each message is preceded by a varint32 byte length.
 *
 *   stream = { varint32(len) bytes[len] }*
 *
 * Encoding takes two passes:
 * size everything first, then write into a single allocation.
 */

import { FramingError } from '../util/errors.ts';
import { intVarintSize, readVarint32, writeIntVarint } from '../util/varint.ts';

/**
 * Split a stream into its message payloads.
 *
 * The returned slices are views into `buf`. The frames must cover the buffer
 * exactly; a trailing partial frame is a FramingError.
 */
export function decodeStream(buf: Uint8Array): Uint8Array[] {
  const messages: Uint8Array[] = [];
  let pos = 0;
  while (pos < buf.length) {
    const prefix = readVarint32(buf, pos);
    const start = pos + prefix.length;
    const end = start + prefix.value;
    if (end > buf.length) {
      throw new FramingError(
        `Frame at offset ${pos} declares ${prefix.value} bytes but only ${buf.length - start} remain`,
        pos
      );
    }
    messages.push(buf.subarray(start, end));
    pos = end;
  }
  return messages;
}

/** Concatenate messages, each behind its varint32 length prefix. */
export function encodeStream(messages: readonly Uint8Array[]): Uint8Array {
  let totalSize = 0;
  for (const msg of messages) {
    totalSize += intVarintSize(msg.length) + msg.length;
  }

  const buf = new Uint8Array(totalSize);
  let off = 0;
  for (const msg of messages) {
    off += writeIntVarint(buf, off, msg.length);
    buf.set(msg, off);
    off += msg.length;
  }
  return buf;
}
