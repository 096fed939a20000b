import { LabelError } from "../utils/errors";

// DNS label limit
export const MAX_LABEL_LENGTH = 64;

/** Offsets 0 and 1 are never assigned, so 0 can stand for "no offset". */
export const FIRST_LABEL_OFFSET = 2;

export const LABEL_SEPARATOR = 0x2e; // "."

const foldCase = (byte: number): number =>
  byte >= 0x41 && byte <= 0x5a ? byte | 0x20 : byte;

/**
 * Orders two labels the way sibling nodes are kept: ASCII letters compare
 * case-insensitively, and on a shared prefix the shorter label comes first.
 */
export function compareLabels(a: Uint8Array, b: Uint8Array): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const diff = foldCase(a[i]) - foldCase(b[i]);
    if (diff !== 0) {
      return diff;
    }
  }
  return a.length - b.length;
}

export function assertLabel(label: Uint8Array): void {
  if (label.length === 0) {
    throw new LabelError("Empty label");
  }
  if (label.length > MAX_LABEL_LENGTH) {
    throw new LabelError(
      `Label too long: ${label.length} bytes (max ${MAX_LABEL_LENGTH})`
    );
  }
}

/**
 * Splits a dotted name into its labels, rightmost first.
 * The returned slices share memory with one UTF-8 copy of the name.
 */
export function splitLabels(name: string): Buffer[] {
  const bytes = Buffer.from(name, "utf8");
  const labels: Buffer[] = [];
  let end = bytes.length;

  for (let i = bytes.length - 1; i >= 0; i--) {
    if (bytes[i] === LABEL_SEPARATOR) {
      const label = bytes.subarray(i + 1, end);
      assertLabel(label);
      labels.push(label);
      end = i;
    }
  }

  const first = bytes.subarray(0, end);
  assertLabel(first);
  labels.push(first);

  return labels;
}
