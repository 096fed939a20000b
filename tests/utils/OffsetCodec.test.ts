import { OffsetCodec } from "../../utils/OffsetCodec";
import { OffsetCodecError } from "../../utils/errors";

describe("OffsetCodec", () => {
  describe("encode", () => {
    it.each<[number, number[]]>([
      [0x00, [0x00]],
      [0x7f, [0x7f]],
      [0x80, [0xc2, 0x80]],
      [0x7ff, [0xdf, 0xbf]],
      [0x800, [0xe0, 0xa0, 0x80]],
      [0xd800, [0xed, 0xa0, 0x80]],
      [0xffff, [0xef, 0xbf, 0xbf]],
      [0x10000, [0xf0, 0x90, 0x80, 0x80]],
      [0x200000, [0xf8, 0x88, 0x80, 0x80, 0x80]],
      [0x4000000, [0xfc, 0x84, 0x80, 0x80, 0x80, 0x80]],
      [0x7fffffff, [0xfd, 0xbf, 0xbf, 0xbf, 0xbf, 0xbf]],
    ])("should encode %i as its multi-byte form", (value, bytes) => {
      expect([...OffsetCodec.encode(value)]).toEqual(bytes);
    });

    it("should pick the shortest length for each range boundary", () => {
      expect(OffsetCodec.byteLength(0x7f)).toBe(1);
      expect(OffsetCodec.byteLength(0x80)).toBe(2);
      expect(OffsetCodec.byteLength(0xffff)).toBe(3);
      expect(OffsetCodec.byteLength(0x1fffff)).toBe(4);
      expect(OffsetCodec.byteLength(0x3ffffff)).toBe(5);
      expect(OffsetCodec.byteLength(0x4000000)).toBe(6);
    });

    it("should reject values outside the unsigned 31-bit range", () => {
      expect(() => OffsetCodec.encode(-1)).toThrow(OffsetCodecError);
      expect(() => OffsetCodec.encode(0x80000000)).toThrow(OffsetCodecError);
      expect(() => OffsetCodec.encode(1.5)).toThrow(OffsetCodecError);
    });
  });

  describe("decode", () => {
    it("should decode a value starting at an offset", () => {
      const buffer = Buffer.from([0x01, 0xc2, 0x80]);
      expect(OffsetCodec.decode(buffer, 1)).toEqual({
        value: 0x80,
        bytesRead: 2,
      });
    });

    it("should accept values in the UTF-16 surrogate range", () => {
      expect(OffsetCodec.decode(Buffer.from([0xed, 0xa0, 0x80]))).toEqual({
        value: 0xd800,
        bytesRead: 3,
      });
    });

    it("should decode the largest six-byte value", () => {
      const buffer = Buffer.from([0xfd, 0xbf, 0xbf, 0xbf, 0xbf, 0xbf]);
      expect(OffsetCodec.decode(buffer).value).toBe(0x7fffffff);
    });

    it("should reject a stray continuation byte as lead", () => {
      expect(() => OffsetCodec.decode(Buffer.from([0x80]))).toThrow(
        "Malformed lead byte 0x80"
      );
    });

    it("should reject 0xfe and 0xff lead bytes", () => {
      expect(() => OffsetCodec.decode(Buffer.from([0xfe]))).toThrow(
        OffsetCodecError
      );
      expect(() => OffsetCodec.decode(Buffer.from([0xff]))).toThrow(
        OffsetCodecError
      );
    });

    it("should reject a truncated continuation run", () => {
      expect(() => OffsetCodec.decode(Buffer.from([0xe0, 0xa0]))).toThrow(
        "Truncated sequence: expected 3 bytes, 2 left"
      );
    });

    it("should reject a continuation byte without the 10 prefix", () => {
      expect(() => OffsetCodec.decode(Buffer.from([0xc2, 0x41]))).toThrow(
        "Malformed continuation byte 0x41"
      );
    });

    it("should reject overlong encodings", () => {
      expect(() => OffsetCodec.decode(Buffer.from([0xc0, 0x80]))).toThrow(
        "Overlong 2-byte encoding of 0"
      );
      expect(() =>
        OffsetCodec.decode(Buffer.from([0xe0, 0x81, 0xbf]))
      ).toThrow("Overlong 3-byte encoding of 127");
    });

    it("should report where decoding failed", () => {
      try {
        OffsetCodec.decodeAll(Buffer.from([0x02, 0xc2, 0x41]));
        throw new Error("expected decodeAll to fail");
      } catch (error) {
        expect(error).toBeInstanceOf(OffsetCodecError);
        if (error instanceof OffsetCodecError) {
          expect(error.position).toBe(2);
        }
      }
    });
  });

  describe("sequences", () => {
    it("should pack a sequence of offsets back to back", () => {
      const encoded = OffsetCodec.encodeAll([2, 0x80, 0x7f, 0x800]);
      expect([...encoded]).toEqual([
        0x02, 0xc2, 0x80, 0x7f, 0xe0, 0xa0, 0x80,
      ]);
      expect(OffsetCodec.decodeAll(encoded)).toEqual([2, 0x80, 0x7f, 0x800]);
    });

    it("should decode an empty buffer to an empty list", () => {
      expect(OffsetCodec.decodeAll(Buffer.alloc(0))).toEqual([]);
      expect(OffsetCodec.encodeAll([]).length).toBe(0);
    });

    it("should fail the whole sequence on a trailing incomplete value", () => {
      expect(() =>
        OffsetCodec.decodeAll(Buffer.from([0x02, 0x06, 0xf0, 0x90]))
      ).toThrow(OffsetCodecError);
    });
  });
});
