import { blake2b } from '@noble/hashes/blake2b';
import { utf8ToBytes } from '@noble/hashes/utils';

/**
 * Little-endian serializer feeding a keyed BLAKE2b-256 hasher
 */
export class HashWriter {
  private readonly hasher: ReturnType<typeof blake2b.create>;

  constructor(domain: string) {
    this.hasher = blake2b.create({ dkLen: 32, key: utf8ToBytes(domain) });
  }

  bytes(data: Uint8Array): this {
    this.hasher.update(data);
    return this;
  }

  u8(value: number): this {
    return this.bytes(Uint8Array.of(value & 0xff));
  }

  u16(value: number): this {
    const buf = new Uint8Array(2);
    new DataView(buf.buffer).setUint16(0, value, true);
    return this.bytes(buf);
  }

  u32(value: number): this {
    const buf = new Uint8Array(4);
    new DataView(buf.buffer).setUint32(0, value, true);
    return this.bytes(buf);
  }

  u64(value: bigint): this {
    const buf = new Uint8Array(8);
    new DataView(buf.buffer).setBigUint64(0, value, true);
    return this.bytes(buf);
  }

  /**
   * Length-prefixed (u64) byte string
   */
  varBytes(data: Uint8Array): this {
    return this.u64(BigInt(data.length)).bytes(data);
  }

  finalize(): Uint8Array {
    return this.hasher.digest();
  }
}
