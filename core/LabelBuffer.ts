import { assertLabel, FIRST_LABEL_OFFSET } from "../schema/Label";
import { BufferExhaustedError, LabelError } from "../utils/errors";
import { ResolvedEncoderOptions } from "./EncoderOptions";

/**
 * Append-only arena of `[length][label bytes]` records.
 * A record's offset is its permanent identity; storage grows in fixed steps
 * and previously returned offsets stay valid.
 */
export class LabelBuffer {
  private bytes: Buffer = Buffer.alloc(0);
  private cursor = FIRST_LABEL_OFFSET;
  private count = 0;

  constructor(private readonly options: ResolvedEncoderOptions) {}

  /** Bytes consumed, reserved prefix included. */
  get size(): number {
    return this.cursor;
  }

  get capacity(): number {
    return this.bytes.length;
  }

  get labelCount(): number {
    return this.count;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  append(label: Uint8Array): number {
    assertLabel(label);

    const end = this.cursor + 1 + label.length;
    if (end > this.bytes.length) {
      this.grow(end);
    }

    const offset = this.cursor;
    this.bytes[offset] = label.length;
    this.bytes.set(label, offset + 1);
    this.cursor = end;
    this.count++;

    return offset;
  }

  /** True when `offset` names a record lying fully inside the written bytes. */
  contains(offset: number): boolean {
    if (
      !Number.isInteger(offset) ||
      offset < FIRST_LABEL_OFFSET ||
      offset >= this.cursor
    ) {
      return false;
    }
    return offset + 1 + this.bytes[offset] <= this.cursor;
  }

  labelLength(offset: number): number {
    this.assertRecord(offset);
    return this.bytes[offset];
  }

  /**
   * Returns a view of the label bytes. The view is only good until the next
   * append, which may move storage.
   */
  readLabel(offset: number): Buffer {
    this.assertRecord(offset);
    return this.bytes.subarray(offset + 1, offset + 1 + this.bytes[offset]);
  }

  /** Offsets of every record, in write order. */
  *offsets(): Generator<number> {
    let offset = FIRST_LABEL_OFFSET;
    while (offset < this.cursor) {
      yield offset;
      offset += 1 + this.bytes[offset];
    }
  }

  private grow(required: number): void {
    const { growthStep, maxCapacity, logger } = this.options;

    if (required > maxCapacity) {
      throw new BufferExhaustedError(
        `Label buffer full: ${required} bytes needed, limit is ${maxCapacity}`,
        required,
        maxCapacity
      );
    }

    const capacity = Math.min(
      Math.ceil(required / growthStep) * growthStep,
      maxCapacity
    );

    let next: Buffer;
    try {
      next = Buffer.alloc(capacity);
    } catch (error) {
      if (error instanceof RangeError) {
        throw new BufferExhaustedError(
          `Cannot allocate ${capacity} bytes for the label buffer`,
          capacity,
          maxCapacity
        );
      }
      throw error;
    }

    next.set(this.bytes);
    logger.trace(
      { from: this.bytes.length, to: capacity },
      "Label buffer grown"
    );
    this.bytes = next;
  }

  private assertRecord(offset: number): void {
    if (!this.contains(offset)) {
      throw new LabelError(`No label record at offset ${offset}`);
    }
  }
}
