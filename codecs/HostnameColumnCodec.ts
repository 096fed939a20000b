import { HostnameEncoder } from "../core/HostnameEncoder";
import { HostnameCodecError, OffsetCodecError } from "../utils/errors";
import { OffsetCodec } from "../utils/OffsetCodec";
import { IColumnCodec } from "./IColumnCodec";

/**
 * Packs a column of hostnames into one buffer:
 * `[count]` then `[byteLength][compressed bytes]` per name, every integer
 * written with the offset codec. Decoding needs the same encoder instance.
 */
export class HostnameColumnCodec implements IColumnCodec<string> {
  constructor(private readonly encoder: HostnameEncoder) {}

  encode(names: string[]): Buffer {
    const parts: Buffer[] = [OffsetCodec.encode(names.length)];

    for (const name of names) {
      const compressed = this.encoder.compressHostname(name);
      if (compressed.length === 0) {
        throw new HostnameCodecError(`Cannot compress hostname "${name}"`);
      }
      parts.push(OffsetCodec.encode(compressed.length), compressed);
    }

    return Buffer.concat(parts);
  }

  decode(buffer: Buffer): string[] {
    if (buffer.length === 0) return [];

    let offset = 0;
    const readInteger = (what: string): number => {
      try {
        const { value, bytesRead } = OffsetCodec.decode(buffer, offset);
        offset += bytesRead;
        return value;
      } catch (error) {
        if (error instanceof OffsetCodecError) {
          throw new HostnameCodecError(`Truncated ${what}: ${error.message}`);
        }
        throw error;
      }
    };

    const count = readInteger("name count");
    const names: string[] = [];

    for (let i = 0; i < count; i++) {
      const length = readInteger("entry length");
      if (offset + length > buffer.length) {
        throw new HostnameCodecError(`Truncated entry ${i}`);
      }

      const name = this.encoder.decompressHostname(
        buffer.subarray(offset, offset + length)
      );
      if (name === "") {
        throw new HostnameCodecError(`Entry ${i} does not decompress`);
      }

      names.push(name);
      offset += length;
    }

    if (offset !== buffer.length) {
      throw new HostnameCodecError(
        `${buffer.length - offset} trailing bytes after ${count} entries`
      );
    }

    return names;
  }
}
