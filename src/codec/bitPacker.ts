import { ShortBufferError } from './errors';

export const MAX_FIELD_BITS = 32;

export type PackField = readonly [value: number, bits: number];

function assertWidth(bits: number): void {
  if (!Number.isInteger(bits) || bits < 1 || bits > MAX_FIELD_BITS) {
    throw new RangeError(`field width must be an integer in 1..${MAX_FIELD_BITS}, got ${bits}`);
  }
}

export function fitsUnsigned(value: number, bits: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 2 ** bits - 1;
}

export function byteLengthForBits(bits: number): number {
  return Math.ceil(bits / 8);
}

/**
 * Bit cursor over a byte buffer, most-significant bit first.
 * The buffer must be zero-filled; bits are OR-ed in.
 */
export class BitWriter {
  private bitPos = 0;

  constructor(private readonly buf: Uint8Array) {}

  get bitsWritten(): number {
    return this.bitPos;
  }

  write(value: number, bits: number): void {
    assertWidth(bits);
    if (!fitsUnsigned(value, bits)) {
      throw new RangeError(`value ${value} does not fit in ${bits} bits`);
    }
    if (this.bitPos + bits > this.buf.length * 8) {
      throw new RangeError(`write of ${bits} bits overruns a ${this.buf.length}-byte buffer`);
    }

    let remaining = bits;
    while (remaining > 0) {
      const byteIndex = this.bitPos >>> 3;
      const free = 8 - (this.bitPos & 7);
      const take = Math.min(free, remaining);
      // >>> keeps full 32-bit values unsigned
      const chunk = (value >>> (remaining - take)) & ((1 << take) - 1);
      this.buf[byteIndex] |= chunk << (free - take);
      this.bitPos += take;
      remaining -= take;
    }
  }
}

export class BitReader {
  private bitPos = 0;

  constructor(private readonly buf: Uint8Array) {}

  get bitsAvailable(): number {
    return this.buf.length * 8 - this.bitPos;
  }

  read(bits: number): number {
    assertWidth(bits);
    if (bits > this.bitsAvailable) {
      throw new ShortBufferError(this.bitPos + bits, this.buf.length * 8);
    }

    let value = 0;
    let remaining = bits;
    while (remaining > 0) {
      const byteIndex = this.bitPos >>> 3;
      const free = 8 - (this.bitPos & 7);
      const take = Math.min(free, remaining);
      const chunk = (this.buf[byteIndex] >>> (free - take)) & ((1 << take) - 1);
      // multiply instead of shifting so 32-bit fields stay positive
      value = value * 2 ** take + chunk;
      this.bitPos += take;
      remaining -= take;
    }
    return value;
  }
}

/**
 * Packs (value, width) pairs MSB-first into the smallest whole number of bytes.
 * Trailing bits of the last byte are zero.
 */
export function pack(fields: readonly PackField[]): Uint8Array {
  const totalBits = fields.reduce((sum, [, bits]) => sum + bits, 0);
  const buf = new Uint8Array(byteLengthForBits(totalBits));
  const writer = new BitWriter(buf);
  for (const [value, bits] of fields) {
    writer.write(value, bits);
  }
  return buf;
}

/**
 * Reads one unsigned value per width. Bytes past the layout are ignored.
 */
export function unpack(buf: Uint8Array, widths: readonly number[]): number[] {
  widths.forEach(assertWidth);
  const neededBits = widths.reduce((sum, bits) => sum + bits, 0);
  const availableBits = buf.length * 8;
  if (availableBits < neededBits) {
    throw new ShortBufferError(neededBits, availableBits);
  }
  const reader = new BitReader(buf);
  return widths.map((bits) => reader.read(bits));
}
