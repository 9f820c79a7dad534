export type CodecErrorCode = 'SHORT_BUFFER' | 'UNSUPPORTED_KIND' | 'QUANTIZATION_OVERFLOW';

/**
 * Base class for every failure the codec reports
 */
export abstract class CodecError extends Error {
  public abstract readonly code: CodecErrorCode;

  constructor(message: string) {
    super(message);
    this.name = 'CodecError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ShortBufferError extends CodecError {
  public readonly code = 'SHORT_BUFFER';

  constructor(
    public readonly neededBits: number,
    public readonly availableBits: number,
  ) {
    super(`buffer too short: need ${neededBits} bits, have ${availableBits}`);
    this.name = 'ShortBufferError';
  }
}

export class UnsupportedKindError extends CodecError {
  public readonly code = 'UNSUPPORTED_KIND';

  constructor(public readonly tag: number | string) {
    super(typeof tag === 'number'
      ? `unsupported message kind: 0x${tag.toString(16).padStart(2, '0')}`
      : `unsupported message kind: ${tag}`);
    this.name = 'UnsupportedKindError';
  }
}

export class QuantizationOverflowError extends CodecError {
  public readonly code = 'QUANTIZATION_OVERFLOW';

  constructor(public readonly field: string, public readonly value?: number) {
    super(value === undefined
      ? `${field} does not fit its wire field`
      : `${field} does not fit its wire field: ${value}`);
    this.name = 'QuantizationOverflowError';
  }
}

export type CodecResult<T> = { ok: true; value: T } | { ok: false; error: CodecError };

/**
 * Runs a codec operation and returns its failure as a value.
 * Anything that is not a CodecError is a bug and is rethrown.
 */
export function toCodecResult<T>(operation: () => T): CodecResult<T> {
  try {
    return { ok: true, value: operation() };
  } catch (error) {
    if (error instanceof CodecError) {
      return { ok: false, error };
    }
    throw error;
  }
}
