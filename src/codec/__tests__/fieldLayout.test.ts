import { QuantizationOverflowError, ShortBufferError } from '../errors';
import { FieldLayout } from '../fieldLayout';

describe('FieldLayout', () => {
  const layout = new FieldLayout([
    { name: 'flag', bits: 1 },
    { name: 'delta', bits: 7, signed: true },
    { name: 'count', bits: 12 },
  ] as const);

  it('sums widths and rounds up to whole bytes', () => {
    expect(layout.totalBits).toBe(20);
    expect(layout.byteLength).toBe(3);
  });

  it('encodes named values in declaration order', () => {
    const bytes = layout.encode({ count: 0xABC, delta: 5, flag: 1 });

    // 1 | 0000101 | 101010111100 | 0000
    expect(Array.from(bytes)).toEqual([0x85, 0xAB, 0xC0]);
  });

  it('stores signed fields as two\'s complement', () => {
    const bytes = layout.encode({ flag: 0, delta: -1, count: 0 });

    expect(Array.from(bytes)).toEqual([0x7F, 0x00, 0x00]);
    expect(layout.decode(bytes)).toEqual([0, -1, 0]);
  });

  it('decodes the signed range ends', () => {
    expect(layout.decode(layout.encode({ flag: 1, delta: -64, count: 4095 }))).toEqual([1, -64, 4095]);
    expect(layout.decode(layout.encode({ flag: 0, delta: 63, count: 1 }))).toEqual([0, 63, 1]);
  });

  it('names the field that overflows', () => {
    expect(() => layout.encode({ flag: 2, delta: 0, count: 0 })).toThrow(new QuantizationOverflowError('flag', 2));
    expect(() => layout.encode({ flag: 0, delta: 64, count: 0 })).toThrow(new QuantizationOverflowError('delta', 64));
    expect(() => layout.encode({ flag: 0, delta: -65, count: 0 })).toThrow(QuantizationOverflowError);
  });

  it('fails with ShortBuffer on truncated input', () => {
    expect(() => layout.decode(Uint8Array.from([0x85, 0xAB]))).toThrow(new ShortBufferError(20, 16));
  });

  it('rejects invalid declarations', () => {
    expect(() => new FieldLayout([{ name: 'a', bits: 0 }])).toThrow(RangeError);
    expect(() => new FieldLayout([{ name: 'a', bits: 40 }])).toThrow(RangeError);
    expect(() => new FieldLayout([{ name: 'a', bits: 1 }, { name: 'a', bits: 2 }])).toThrow(/duplicate/);
  });
});
