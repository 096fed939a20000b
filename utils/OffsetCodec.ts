import { OffsetCodecError } from "./errors";

export const MAX_ENCODABLE_OFFSET = 0x7fffffff;

// Largest value that fits in 1..6 bytes.
const RANGE_LIMITS = [0x7f, 0x7ff, 0xffff, 0x1fffff, 0x3ffffff, 0x7fffffff];

// Lead byte marker for a sequence of index + 1 bytes.
const LEAD_PREFIXES = [0x00, 0xc0, 0xe0, 0xf0, 0xf8, 0xfc];

const CONTINUATION_MASK = 0xc0;
const CONTINUATION_TAG = 0x80;
const PAYLOAD_MASK = 0x3f;

/**
 * Self-delimiting variable-length codec for unsigned 31-bit integers.
 * The byte layout follows the original six-byte UTF-8 design, but values are
 * plain integers: surrogates and values past U+10FFFF are legal.
 */
export class OffsetCodec {
  static byteLength(value: number): number {
    OffsetCodec.assertEncodable(value);
    return RANGE_LIMITS.findIndex((limit) => value <= limit) + 1;
  }

  static encode(value: number): Buffer {
    const length = OffsetCodec.byteLength(value);
    if (length === 1) {
      return Buffer.from([value]);
    }

    const bytes = Buffer.alloc(length);
    let rest = value;
    for (let i = length - 1; i > 0; i--) {
      bytes[i] = CONTINUATION_TAG | (rest & PAYLOAD_MASK);
      rest >>>= 6;
    }
    bytes[0] = LEAD_PREFIXES[length - 1] | rest;

    return bytes;
  }

  /**
   * Decodes one integer starting at `offset`.
   * Returns the decoded value and the number of bytes read.
   */
  static decode(
    buffer: Uint8Array,
    offset: number = 0
  ): { value: number; bytesRead: number } {
    if (offset >= buffer.length) {
      throw new OffsetCodecError("Offset decode out of bounds", offset);
    }

    const lead = buffer[offset];
    const length = OffsetCodec.sequenceLength(lead);
    if (length === 0) {
      throw new OffsetCodecError(
        `Malformed lead byte 0x${lead.toString(16)}`,
        offset
      );
    }
    if (offset + length > buffer.length) {
      throw new OffsetCodecError(
        `Truncated sequence: expected ${length} bytes, ${buffer.length - offset} left`,
        offset
      );
    }
    if (length === 1) {
      return { value: lead, bytesRead: 1 };
    }

    let value = lead & (0xff >> (length + 1));
    for (let i = 1; i < length; i++) {
      const byte = buffer[offset + i];
      if ((byte & CONTINUATION_MASK) !== CONTINUATION_TAG) {
        throw new OffsetCodecError(
          `Malformed continuation byte 0x${byte.toString(16)}`,
          offset + i
        );
      }
      value = (value << 6) | (byte & PAYLOAD_MASK);
    }

    if (value <= RANGE_LIMITS[length - 2]) {
      throw new OffsetCodecError(
        `Overlong ${length}-byte encoding of ${value}`,
        offset
      );
    }

    return { value, bytesRead: length };
  }

  static encodeAll(values: readonly number[]): Buffer {
    return Buffer.concat(values.map((value) => OffsetCodec.encode(value)));
  }

  static decodeAll(buffer: Uint8Array): number[] {
    const values: number[] = [];
    let offset = 0;

    while (offset < buffer.length) {
      const { value, bytesRead } = OffsetCodec.decode(buffer, offset);
      values.push(value);
      offset += bytesRead;
    }

    return values;
  }

  // Counts the run of leading one bits; 0 marks an invalid lead byte.
  private static sequenceLength(lead: number): number {
    let ones = 0;
    while (ones < 8 && (lead & (0x80 >> ones)) !== 0) {
      ones++;
    }
    if (ones === 0) return 1;
    if (ones === 1 || ones > LEAD_PREFIXES.length) return 0;
    return ones;
  }

  private static assertEncodable(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > MAX_ENCODABLE_OFFSET) {
      throw new OffsetCodecError(
        `OffsetCodec only supports integers in 0..0x7fffffff, got ${value}`,
        -1
      );
    }
  }
}
