import {
  CodecError,
  MessageRegistry,
  defaultRegistry,
  fromGeo,
  type AirTrackReport,
  type Message,
} from '../codec';
import { telemetrySchema, telemetryToGeoInput } from '../schemas/telemetry.schemas';
import logger from '../utils/logger';
import { DEFAULT_ASSOCIATED_DATA, type FrameSealer } from './FrameSealer';
import type { FrameSink } from './UdpFrameSink';

export interface TrackBridgeOptions {
  sink: FrameSink;
  sealer?: FrameSealer;
  registry?: MessageRegistry;
  associatedData?: string;
}

export type RejectReason =
  | 'invalid_json'
  | 'invalid_telemetry'
  | 'quantization_overflow'
  | 'encode_failed'
  | 'sink_failed';

export type BridgeOutcome =
  | { status: 'forwarded'; report: AirTrackReport; frame: Uint8Array }
  | { status: 'rejected'; reason: RejectReason; detail: string };

export interface BridgeStats {
  forwarded: number;
  rejected: number;
  failed: number;
}

/**
 * Telemetry JSON in, air-track frames out. One bad message never stops
 * the stream: every outcome is reported back to the caller.
 */
export class TrackBridgeService {
  private readonly sink: FrameSink;

  private readonly sealer?: FrameSealer;

  private readonly registry: MessageRegistry;

  private readonly associatedData: string;

  private stats: BridgeStats = { forwarded: 0, rejected: 0, failed: 0 };

  constructor(options: TrackBridgeOptions) {
    this.sink = options.sink;
    this.sealer = options.sealer;
    this.registry = options.registry ?? defaultRegistry;
    this.associatedData = options.associatedData ?? DEFAULT_ASSOCIATED_DATA;
  }

  isSealing(): boolean {
    return this.sealer !== undefined;
  }

  getStats(): BridgeStats {
    return { ...this.stats };
  }

  private reject(reason: RejectReason, detail: string, channel?: string): BridgeOutcome {
    this.stats.rejected += 1;
    logger.warn('Dropped telemetry message', { channel, reason, detail });
    return { status: 'rejected', reason, detail };
  }

  /**
   * Builds the wire frame for one report, sealed when a sealer is configured
   */
  buildFrame(report: AirTrackReport): Uint8Array {
    const plaintext = this.registry.encode({ kind: 'airTrack', report });
    return this.sealer ? this.sealer.seal(plaintext, this.associatedData) : plaintext;
  }

  async handlePayload(payload: string | Buffer, channel?: string): Promise<BridgeOutcome> {
    let raw: unknown;
    try {
      raw = JSON.parse(payload.toString());
    } catch (error) {
      return this.reject('invalid_json', error instanceof Error ? error.message : String(error), channel);
    }

    const parsed = telemetrySchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      return this.reject('invalid_telemetry', detail, channel);
    }

    let report: AirTrackReport;
    let frame: Uint8Array;
    try {
      report = fromGeo(telemetryToGeoInput(parsed.data));
      frame = this.buildFrame(report);
    } catch (error) {
      if (error instanceof CodecError) {
        const reason = error.code === 'QUANTIZATION_OVERFLOW' ? 'quantization_overflow' : 'encode_failed';
        return this.reject(reason, error.message, channel);
      }
      throw error;
    }

    try {
      await this.sink.send(frame);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.stats.failed += 1;
      logger.error('Failed to forward air-track frame', { channel, track: report.track, error: detail });
      return { status: 'rejected', reason: 'sink_failed', detail };
    }

    this.stats.forwarded += 1;
    logger.debug('Forwarded air-track frame', {
      channel,
      track: report.track,
      bytes: frame.length,
      sealed: this.isSealing(),
    });
    return { status: 'forwarded', report, frame };
  }

  /**
   * Receiving side: opens a sealed frame when configured, then decodes it.
   * Throws FrameSealError or a CodecError.
   */
  receiveFrame(frame: Uint8Array): Message {
    const plaintext = this.sealer ? this.sealer.open(frame, this.associatedData) : frame;
    return this.registry.decode(plaintext);
  }
}
