/**
 * APK 서명 블록용 little-endian 바이트 읽기/쓰기
 *
 * 서명 블록의 모든 구조는 "uint32 길이 + 내용" 형태의 length-prefixed 값을 중첩해서 씁니다.
 */

export function uint32(value: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeUInt32LE(value >>> 0, 0);
  return buf;
}

export function uint64(value: number): Buffer {
  const buf = Buffer.alloc(8);
  buf.writeBigUInt64LE(BigInt(value), 0);
  return buf;
}

export function lengthPrefixed(value: Buffer): Buffer {
  return Buffer.concat([uint32(value.length), value]);
}

/**
 * length-prefixed 원소들의 length-prefixed 시퀀스
 */
export function lengthPrefixedSequence(items: Buffer[]): Buffer {
  return lengthPrefixed(Buffer.concat(items.map(lengthPrefixed)));
}

/**
 * 범위 검사를 하는 순차 리더. 범위를 벗어나면 onError가 만든 에러를 던집니다.
 */
export class ByteReader {
  private offset = 0;

  constructor(
    private readonly buf: Buffer,
    private readonly onError: (message: string) => Error = (message) => new Error(message)
  ) {}

  get remaining(): number {
    return this.buf.length - this.offset;
  }

  get position(): number {
    return this.offset;
  }

  readUInt32(): number {
    this.ensure(4);
    const value = this.buf.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  readUInt64(): number {
    this.ensure(8);
    const value = this.buf.readBigUInt64LE(this.offset);
    this.offset += 8;
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw this.onError(`64비트 길이가 너무 큽니다: ${value}`);
    }
    return Number(value);
  }

  readBytes(length: number): Buffer {
    this.ensure(length);
    const value = this.buf.subarray(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  readLengthPrefixed(): Buffer {
    return this.readBytes(this.readUInt32());
  }

  /**
   * length-prefixed 시퀀스의 원소들
   */
  readSequence(): Buffer[] {
    const inner = new ByteReader(this.readLengthPrefixed(), this.onError);
    const items: Buffer[] = [];
    while (inner.remaining > 0) {
      items.push(inner.readLengthPrefixed());
    }
    return items;
  }

  private ensure(length: number): void {
    if (length < 0 || this.offset + length > this.buf.length) {
      throw this.onError(
        `데이터가 잘렸습니다 (위치 ${this.offset}, 필요 ${length}, 남음 ${this.remaining})`
      );
    }
  }
}
