import { FieldLayout, type FieldValues } from './fieldLayout';
import {
  ALTITUDE_BITS,
  LATITUDE_BITS,
  LONGITUDE_BITS,
  TRACK_NUMBER_BITS,
  quantizeAltitude,
  quantizeHeading,
  quantizeLatitude,
  quantizeLongitude,
  quantizeSpeed,
  quantizeTrack,
  trackNumberOf,
} from './quantization';

export const AIR_TRACK_KIND = 0x32;

export interface AirTrackReport {
  readonly track: number;
  readonly latitudePacked: number;
  readonly longitudePacked: number;
  readonly trackNumber: number;
  readonly altitudePacked: number;
  readonly parity: number;
  readonly speedMs: number;
  readonly headingCdeg: number;
}

/**
 * Geodetic snapshot as the telemetry producer supplies it
 */
export interface GeoTrackInput {
  track: number;
  latDeg: number;
  lonDeg: number;
  altM: number;
  speedMs: number;
  headingCdeg: number;
}

// Wire order. 117 bits, padded to 15 bytes.
export const AIR_TRACK_LAYOUT = new FieldLayout([
  { name: 'track', bits: 16 },
  { name: 'latitudePacked', bits: LATITUDE_BITS },
  { name: 'longitudePacked', bits: LONGITUDE_BITS },
  { name: 'trackNumber', bits: TRACK_NUMBER_BITS },
  { name: 'altitudePacked', bits: ALTITUDE_BITS },
  { name: 'parity', bits: 5 },
  { name: 'speedMs', bits: 16 },
  { name: 'headingCdeg', bits: 16 },
] as const);

export const AIR_TRACK_BODY_BYTES = AIR_TRACK_LAYOUT.byteLength;

type AirTrackFields = FieldValues<typeof AIR_TRACK_LAYOUT.fields>;

/**
 * Quantizes a geodetic snapshot into its packed report.
 * Throws QuantizationOverflowError for values outside their documented domain.
 */
export function fromGeo(input: GeoTrackInput): AirTrackReport {
  return {
    track: quantizeTrack(input.track),
    latitudePacked: quantizeLatitude(input.latDeg),
    longitudePacked: quantizeLongitude(input.lonDeg),
    trackNumber: trackNumberOf(input.track),
    altitudePacked: quantizeAltitude(input.altM),
    parity: 0,
    speedMs: quantizeSpeed(input.speedMs),
    headingCdeg: quantizeHeading(input.headingCdeg),
  };
}

export function encodeAirTrack(report: AirTrackReport): Uint8Array {
  const fields: AirTrackFields = report;
  return AIR_TRACK_LAYOUT.encode(fields);
}

/**
 * Rebuilds the packed struct as-is; trackNumber is not checked against track.
 */
export function decodeAirTrack(body: Uint8Array): AirTrackReport {
  const [
    track,
    latitudePacked,
    longitudePacked,
    trackNumber,
    altitudePacked,
    parity,
    speedMs,
    headingCdeg,
  ] = AIR_TRACK_LAYOUT.decode(body);
  return {
    track,
    latitudePacked,
    longitudePacked,
    trackNumber,
    altitudePacked,
    parity,
    speedMs,
    headingCdeg,
  };
}
