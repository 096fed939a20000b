export class LabelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LabelError";
  }
}

export class BufferExhaustedError extends Error {
  constructor(
    message: string,
    readonly requested: number,
    readonly maxCapacity: number
  ) {
    super(message);
    this.name = "BufferExhaustedError";
  }
}

export class OffsetCodecError extends Error {
  constructor(message: string, readonly position: number) {
    super(message);
    this.name = "OffsetCodecError";
  }
}

export class HostnameCodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HostnameCodecError";
  }
}
