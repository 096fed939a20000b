import { LABEL_SEPARATOR, splitLabels } from "../schema/Label";
import {
  BufferExhaustedError,
  LabelError,
  OffsetCodecError,
} from "../utils/errors";
import { Logger } from "../utils/logger";
import { OffsetCodec } from "../utils/OffsetCodec";
import {
  HostnameEncoderOptions,
  resolveEncoderOptions,
} from "./EncoderOptions";
import { LabelBuffer } from "./LabelBuffer";
import { LabelTrie } from "./LabelTrie";

export interface EncoderStats {
  labelCount: number;
  nodeCount: number;
  /** Bytes written to the label buffer, reserved prefix included. */
  bytesUsed: number;
  capacity: number;
  maxDepth: number;
}

/**
 * Compresses hostnames against a dictionary of labels shared by every call on
 * the same instance. Output is only meaningful to the instance that wrote it.
 *
 * Failures never throw: compression returns an empty Buffer and
 * decompression an empty string.
 */
export class HostnameEncoder {
  private readonly buffer: LabelBuffer;
  private readonly trie: LabelTrie;
  private readonly logger: Logger;

  constructor(options?: HostnameEncoderOptions) {
    const resolved = resolveEncoderOptions(options);
    this.logger = resolved.logger;
    this.buffer = new LabelBuffer(resolved);
    this.trie = new LabelTrie(this.buffer);
  }

  compressHostname(name: string): Buffer {
    try {
      const offsets = this.trie.walk(splitLabels(name));
      return OffsetCodec.encodeAll(offsets);
    } catch (error) {
      if (
        error instanceof LabelError ||
        error instanceof BufferExhaustedError
      ) {
        this.logger.debug(
          { err: error, input: name },
          "Hostname compression failed"
        );
        return Buffer.alloc(0);
      }
      throw error;
    }
  }

  decompressHostname(compressed: Uint8Array): string {
    if (compressed.length === 0 || this.buffer.isEmpty) {
      return "";
    }

    let offsets: number[];
    try {
      offsets = OffsetCodec.decodeAll(compressed);
    } catch (error) {
      if (error instanceof OffsetCodecError) {
        this.logger.debug(
          { err: error, input: Buffer.from(compressed).toString("hex") },
          "Hostname decompression failed"
        );
        return "";
      }
      throw error;
    }

    // one separator per label, minus one
    let totalLength = -1;
    for (const offset of offsets) {
      if (!this.buffer.contains(offset)) {
        this.logger.debug(
          { offset, bufferSize: this.buffer.size },
          "Offset outside the label buffer"
        );
        return "";
      }
      totalLength += this.buffer.labelLength(offset) + 1;
    }
    if (totalLength <= 0) {
      return "";
    }

    // Offsets run TLD first, so fill the output from its end.
    const output = Buffer.alloc(totalLength);
    let cursor = totalLength;
    offsets.forEach((offset, index) => {
      const label = this.buffer.readLabel(offset);
      cursor -= label.length;
      output.set(label, cursor);

      if (index !== offsets.length - 1) {
        output[--cursor] = LABEL_SEPARATOR;
      }
    });

    return output.toString("utf8");
  }

  compressAll(names: Iterable<string>): Buffer[] {
    return Array.from(names, (name) => this.compressHostname(name));
  }

  decompressAll(compressed: Iterable<Uint8Array>): string[] {
    return Array.from(compressed, (bytes) => this.decompressHostname(bytes));
  }

  /** Label of every trie node, in the order it was written. */
  labels(): string[] {
    return Array.from(this.buffer.offsets(), (offset) =>
      this.buffer.readLabel(offset).toString("utf8")
    );
  }

  /** Dotted suffixes the dictionary can currently spell. */
  suffixes(): string[] {
    return Array.from(this.trie.entries());
  }

  stats(): EncoderStats {
    return {
      labelCount: this.buffer.labelCount,
      nodeCount: this.trie.nodeCount,
      bytesUsed: this.buffer.size,
      capacity: this.buffer.capacity,
      maxDepth: this.trie.depth(),
    };
  }

  /** Checks that every node's children are still in sorted order. */
  validate(): boolean {
    return this.trie.isSorted();
  }
}
