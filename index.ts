export { HostnameEncoder } from "./core/HostnameEncoder";
export type { EncoderStats } from "./core/HostnameEncoder";
export { DEFAULT_GROWTH_STEP } from "./core/EncoderOptions";
export type { HostnameEncoderOptions } from "./core/EncoderOptions";
export { LabelBuffer } from "./core/LabelBuffer";
export { LabelTrie } from "./core/LabelTrie";
export type { LabelNode } from "./core/LabelTrie";
export { HostnameColumnCodec } from "./codecs/HostnameColumnCodec";
export type { IColumnCodec } from "./codecs/IColumnCodec";
export { OffsetCodec, MAX_ENCODABLE_OFFSET } from "./utils/OffsetCodec";
export {
  compareLabels,
  splitLabels,
  MAX_LABEL_LENGTH,
  FIRST_LABEL_OFFSET,
} from "./schema/Label";
export {
  LabelError,
  BufferExhaustedError,
  OffsetCodecError,
  HostnameCodecError,
} from "./utils/errors";
