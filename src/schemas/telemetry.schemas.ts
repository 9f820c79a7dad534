import { z } from 'zod';
import type { GeoTrackInput } from '../codec/airTrack';

const uint16 = z.number().int().min(0).max(0xFFFF);

/**
 * Telemetry JSON as published on the bridge channels. Geodetic ranges are
 * left to the quantization step so overflow is reported per wire field.
 */
export const telemetrySchema = z.object({
  track: uint16,
  lat: z.number().finite(),
  lon: z.number().finite(),
  alt_m: z.number().finite(),
  speed_ms: uint16,
  heading_deg: uint16,
});

export type Telemetry = z.infer<typeof telemetrySchema>;

// heading_deg carries the heading code verbatim
export function telemetryToGeoInput(telemetry: Telemetry): GeoTrackInput {
  return {
    track: telemetry.track,
    latDeg: telemetry.lat,
    lonDeg: telemetry.lon,
    altM: telemetry.alt_m,
    speedMs: telemetry.speed_ms,
    headingCdeg: telemetry.heading_deg,
  };
}
