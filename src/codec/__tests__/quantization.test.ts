import { QuantizationOverflowError } from '../errors';
import {
  ALTITUDE_MAX_CODE,
  ALTITUDE_MAX_M,
  LATITUDE_MAX_CODE,
  LONGITUDE_MAX_CODE,
  altitudeFromCode,
  latitudeFromCode,
  longitudeFromCode,
  quantizeAltitude,
  quantizeHeading,
  quantizeLatitude,
  quantizeLongitude,
  quantizeSpeed,
  trackNumberOf,
} from '../quantization';

describe('quantization', () => {
  describe('latitude', () => {
    it('maps the domain ends onto the code range', () => {
      expect(quantizeLatitude(-90)).toBe(0);
      expect(quantizeLatitude(90)).toBe(LATITUDE_MAX_CODE);
    });

    it('rounds half up at the equator', () => {
      // 90 * 524287 / 180 = 262143.5
      expect(quantizeLatitude(0)).toBe(262144);
    });

    it('quantizes a mid-latitude value', () => {
      expect(quantizeLatitude(45.1234567)).toBe(393575);
    });

    it('rejects values outside [-90, 90]', () => {
      expect(() => quantizeLatitude(90.0001)).toThrow(new QuantizationOverflowError('latitude', 90.0001));
      expect(() => quantizeLatitude(-91)).toThrow(QuantizationOverflowError);
      expect(() => quantizeLatitude(Number.NaN)).toThrow(QuantizationOverflowError);
    });
  });

  describe('longitude', () => {
    it('maps the domain ends onto the code range', () => {
      expect(quantizeLongitude(-180)).toBe(0);
      expect(quantizeLongitude(180)).toBe(LONGITUDE_MAX_CODE);
      expect(quantizeLongitude(-122.9876543)).toBe(83030);
    });

    it('rejects values outside [-180, 180]', () => {
      expect(() => quantizeLongitude(180.5)).toThrow(QuantizationOverflowError);
      expect(() => quantizeLongitude(Number.POSITIVE_INFINITY)).toThrow(QuantizationOverflowError);
    });
  });

  describe('altitude', () => {
    it('converts meters into 25 ft steps', () => {
      expect(quantizeAltitude(0)).toBe(0);
      expect(quantizeAltitude(1000)).toBe(131);
      expect(quantizeAltitude(1500.9)).toBe(197);
    });

    it('accepts the top of the range', () => {
      expect(quantizeAltitude(ALTITUDE_MAX_M)).toBe(ALTITUDE_MAX_CODE);
    });

    it('normalises negative zero', () => {
      expect(Object.is(quantizeAltitude(-0), 0)).toBe(true);
    });

    it('rejects negative and too-high altitudes', () => {
      expect(() => quantizeAltitude(-1)).toThrow(QuantizationOverflowError);
      expect(() => quantizeAltitude(ALTITUDE_MAX_M + 1)).toThrow(QuantizationOverflowError);
    });

    it('names the failing field', () => {
      expect(() => quantizeAltitude(200000)).toThrow(/altitude/);
    });
  });

  describe('heading and speed', () => {
    it('stores heading centidegrees verbatim', () => {
      expect(quantizeHeading(27100)).toBe(27100);
    });

    it('passes headings past 35999 through', () => {
      expect(quantizeHeading(40000)).toBe(40000);
    });

    it('rejects values that do not fit 16 bits', () => {
      expect(() => quantizeHeading(65536)).toThrow(new QuantizationOverflowError('heading', 65536));
      expect(() => quantizeSpeed(-1)).toThrow(new QuantizationOverflowError('speed', -1));
      expect(() => quantizeSpeed(12.5)).toThrow(QuantizationOverflowError);
    });
  });

  describe('trackNumberOf', () => {
    it('keeps the low 12 bits', () => {
      expect(trackNumberOf(42)).toBe(42);
      expect(trackNumberOf(0xFFFF)).toBe(0x0FFF);
    });

    it('aliases ids that differ only above bit 11', () => {
      expect(trackNumberOf(0x1123)).toBe(trackNumberOf(0x2123));
    });

    it('holds the masking law across the 16-bit range', () => {
      for (let track = 0; track <= 0xFFFF; track += 97) {
        expect(trackNumberOf(track)).toBe(track & 0x0FFF);
      }
    });
  });

  describe('dequantization', () => {
    it('recovers physical values within one step', () => {
      expect(Math.abs(latitudeFromCode(quantizeLatitude(45.1234567)) - 45.1234567)).toBeLessThan(180 / LATITUDE_MAX_CODE);
      expect(Math.abs(longitudeFromCode(quantizeLongitude(-122.9876543)) + 122.9876543)).toBeLessThan(360 / LONGITUDE_MAX_CODE);
      expect(Math.abs(altitudeFromCode(quantizeAltitude(1500.9)) - 1500.9)).toBeLessThan(25 / 3.28084);
    });

    it('maps code ends back to domain ends', () => {
      expect(latitudeFromCode(0)).toBe(-90);
      expect(latitudeFromCode(LATITUDE_MAX_CODE)).toBe(90);
      expect(longitudeFromCode(0)).toBe(-180);
    });
  });
});
