import * as crypto from "node:crypto";
import { ChannelError } from "./errors";

export class BytesReader {
  data: Buffer;
  offset: number;
  constructor (data: Buffer) {
    this.data = data;
    this.offset = 0;
  }
  readUIntBE (length: number): number {
    this.assertAvailable(length)
    const value = this.data.readUIntBE(this.offset, length);
    this.offset += length;
    return value
  }
  readBytes (length: number): Buffer {
    this.assertAvailable(length)
    const bytes = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return bytes
  }
  readRemainder (): Buffer {
    const bytes = this.data.subarray(this.offset);
    this.offset = this.data.length;
    return bytes;
  }
  isExhausted (): boolean {
    return this.offset >= this.data.length
  }
  get remaining (): number {
    return this.data.length - this.offset
  }
  get length (): number {
    return this.data.length
  }
  private assertAvailable (length: number): void {
    if (this.offset + length > this.data.length) {
      throw new ChannelError('invalid_format', `Bytes reader: Attempted to read ${length} bytes but only ${this.remaining} bytes remain`)
    }
  }
}

export function bufferFromUint (length: number, value: number): Buffer {
  const max = 2 ** (length * 8) - 1
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new ChannelError('invalid_format', `value ${value} does not fit in ${length} bytes`)
  }
  const data = Buffer.alloc(length);
  data.writeUIntBE(value, 0, length);
  return data;
}

export const sha256 = (...data: Buffer[]): Buffer => {
  const hash = crypto.createHash('sha256')
  for (const d of data) {
    hash.update(d)
  }
  return hash.digest()
}

export function keysMatch (keyA: Buffer, keyB: Buffer): boolean {
  if (keyA.length !== keyB.length) return false
  return crypto.timingSafeEqual(keyA, keyB)
}
