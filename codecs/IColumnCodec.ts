export interface IColumnCodec<T> {
  encode(values: T[]): Buffer;
  decode(buffer: Buffer): T[];
}
