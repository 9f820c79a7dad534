import {
  MAX_FIELD_BITS,
  byteLengthForBits,
  fitsUnsigned,
  pack,
  unpack,
} from './bitPacker';
import { QuantizationOverflowError } from './errors';

export interface FieldSpec<N extends string = string> {
  readonly name: N;
  readonly bits: number;
  readonly signed?: boolean;
}

export type FieldName<F extends readonly FieldSpec[]> = F[number]['name'];

export type FieldValues<F extends readonly FieldSpec[]> = { readonly [K in FieldName<F>]: number };

function toUnsigned(field: FieldSpec, value: number): number {
  if (!field.signed) {
    if (!fitsUnsigned(value, field.bits)) {
      throw new QuantizationOverflowError(field.name, value);
    }
    return value;
  }
  const half = 2 ** (field.bits - 1);
  if (!Number.isInteger(value) || value < -half || value >= half) {
    throw new QuantizationOverflowError(field.name, value);
  }
  return value < 0 ? value + 2 ** field.bits : value;
}

function fromUnsigned(field: FieldSpec, raw: number): number {
  if (!field.signed) {
    return raw;
  }
  const half = 2 ** (field.bits - 1);
  return raw >= half ? raw - 2 ** field.bits : raw;
}

/**
 * Ordered field table for one message body.
 * Signed fields travel as two's complement in their declared width.
 */
export class FieldLayout<F extends readonly FieldSpec[]> {
  readonly totalBits: number;

  readonly byteLength: number;

  constructor(readonly fields: F) {
    const seen = new Set<string>();
    for (const field of fields) {
      if (!Number.isInteger(field.bits) || field.bits < 1 || field.bits > MAX_FIELD_BITS) {
        throw new RangeError(`field ${field.name} must be 1..${MAX_FIELD_BITS} bits wide`);
      }
      if (seen.has(field.name)) {
        throw new Error(`duplicate field ${field.name}`);
      }
      seen.add(field.name);
    }
    this.totalBits = fields.reduce((sum, field) => sum + field.bits, 0);
    this.byteLength = byteLengthForBits(this.totalBits);
  }

  /**
   * Every value is checked before anything is written, so a failure
   * never leaves a partial buffer behind.
   */
  encode(values: FieldValues<F>): Uint8Array {
    const byName: Readonly<Record<string, number>> = values;
    return pack(this.fields.map((field) => [toUnsigned(field, byName[field.name]), field.bits] as const));
  }

  /**
   * Returns the field values in declaration order.
   */
  decode(buf: Uint8Array): number[] {
    const raw = unpack(buf, this.fields.map((field) => field.bits));
    return raw.map((value, i) => fromUnsigned(this.fields[i], value));
  }
}
