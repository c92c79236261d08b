// seekable byte streams the pixel codec writes to / reads from.
// positions are absolute offsets into the archive being written or read.

export class ByteStreamError extends Error {
  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(message);
    this.name = "ByteStreamError";
  }
}

// append-only; position() reports where the next write lands.
export interface ByteSink {
  readonly position: number;
  write(bytes: Uint8Array): void;
}

export interface ByteSource {
  readonly length: number;
  readonly position: number;
  seek(offset: number): void;
  read(count: number): Uint8Array;
}

const kInitialSinkCapacity = 256;

export class MemoryByteSink implements ByteSink {
  private buffer: Uint8Array;
  private size = 0;

  constructor(initialCapacity: number = kInitialSinkCapacity) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
  }

  get position(): number {
    return this.size;
  }

  write(bytes: Uint8Array): void {
    this.reserve(this.size + bytes.length);
    this.buffer.set(bytes, this.size);
    this.size += bytes.length;
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.size);
  }

  private reserve(capacity: number): void {
    if (capacity <= this.buffer.length) {
      return;
    }
    let next = this.buffer.length;
    while (next < capacity) {
      next *= 2;
    }
    const grown = new Uint8Array(next);
    grown.set(this.buffer.subarray(0, this.size));
    this.buffer = grown;
  }
}

export class MemoryByteSource implements ByteSource {
  private offset = 0;

  constructor(private readonly data: Uint8Array) {}

  get length(): number {
    return this.data.length;
  }

  get position(): number {
    return this.offset;
  }

  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.data.length) {
      throw new ByteStreamError(`Seek out of bounds: ${offset} (length ${this.data.length})`, offset);
    }
    this.offset = offset;
  }

  read(count: number): Uint8Array {
    if (!Number.isInteger(count) || count < 0 || this.offset + count > this.data.length) {
      throw new ByteStreamError(
        `Read out of bounds: ${count} bytes at ${this.offset} (length ${this.data.length})`,
        this.offset,
      );
    }
    const out = this.data.slice(this.offset, this.offset + count);
    this.offset += count;
    return out;
  }
}
