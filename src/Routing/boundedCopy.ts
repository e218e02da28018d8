/** Largest topic handed to a handler, in bytes. */
export const MAX_TOPIC_LENGTH = 127;
/** Largest payload handed to a handler, in bytes. */
export const MAX_PAYLOAD_LENGTH = 255;

export type BoundedText = {
  text: string;
  truncated: boolean;
  /** Byte length before truncation. */
  byteLength: number;
};

/**
 * Copy at most `maxBytes` bytes of `input` and decode them as UTF-8.
 *
 * A multi-byte character cut at the limit decodes as U+FFFD.
 */
export function boundedCopy(input: Buffer | string, maxBytes: number): BoundedText {
  const bytes = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
  const truncated = bytes.length > maxBytes;
  const kept = truncated ? bytes.subarray(0, maxBytes) : bytes;
  return { text: kept.toString('utf8'), truncated, byteLength: bytes.length };
}
