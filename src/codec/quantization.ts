import { QuantizationOverflowError } from './errors';

export const LATITUDE_BITS = 19;
export const LONGITUDE_BITS = 19;
export const ALTITUDE_BITS = 14;
export const TRACK_NUMBER_BITS = 12;

export const LATITUDE_MAX_CODE = 2 ** LATITUDE_BITS - 1; // 524287
export const LONGITUDE_MAX_CODE = 2 ** LONGITUDE_BITS - 1; // 524287
export const ALTITUDE_MAX_CODE = 2 ** ALTITUDE_BITS - 1; // 16383
export const TRACK_NUMBER_MASK = 2 ** TRACK_NUMBER_BITS - 1; // 0x0FFF
export const UINT16_MAX = 0xFFFF;

export const FEET_PER_METER = 3.28084;
export const ALTITUDE_STEP_FT = 25;

/** Highest altitude that still fits the 14-bit field, ~124,828 m */
export const ALTITUDE_MAX_M = (ALTITUDE_MAX_CODE * ALTITUDE_STEP_FT) / FEET_PER_METER;

function inRange(value: number, min: number, max: number): boolean {
  return Number.isFinite(value) && value >= min && value <= max;
}

// "+ 0" turns -0 into 0 so decoded structs compare equal
function roundCode(scaled: number): number {
  return Math.round(scaled) + 0;
}

function requireUint16(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > UINT16_MAX) {
    throw new QuantizationOverflowError(field, value);
  }
  return value;
}

export function quantizeLatitude(latDeg: number): number {
  if (!inRange(latDeg, -90, 90)) {
    throw new QuantizationOverflowError('latitude', latDeg);
  }
  return roundCode(((latDeg + 90) * LATITUDE_MAX_CODE) / 180);
}

export function quantizeLongitude(lonDeg: number): number {
  if (!inRange(lonDeg, -180, 180)) {
    throw new QuantizationOverflowError('longitude', lonDeg);
  }
  return roundCode(((lonDeg + 180) * LONGITUDE_MAX_CODE) / 360);
}

/**
 * Meters to feet, then 25 ft steps.
 */
export function quantizeAltitude(altM: number): number {
  if (!inRange(altM, 0, ALTITUDE_MAX_M)) {
    throw new QuantizationOverflowError('altitude', altM);
  }
  return roundCode((altM * FEET_PER_METER) / ALTITUDE_STEP_FT);
}

/**
 * Heading travels as centidegrees without scaling. Codes past 35999 are
 * semantically invalid but still fit the field and are passed through.
 */
export function quantizeHeading(headingCdeg: number): number {
  return requireUint16('heading', headingCdeg);
}

export function quantizeSpeed(speedMs: number): number {
  return requireUint16('speed', speedMs);
}

export function quantizeTrack(track: number): number {
  return requireUint16('track', track);
}

/**
 * Low 12 bits of the track id. Ids differing only above bit 11 share a code.
 */
export function trackNumberOf(track: number): number {
  return quantizeTrack(track) & TRACK_NUMBER_MASK;
}

export function latitudeFromCode(code: number): number {
  return (code * 180) / LATITUDE_MAX_CODE - 90;
}

export function longitudeFromCode(code: number): number {
  return (code * 360) / LONGITUDE_MAX_CODE - 180;
}

export function altitudeFromCode(code: number): number {
  return (code * ALTITUDE_STEP_FT) / FEET_PER_METER;
}
