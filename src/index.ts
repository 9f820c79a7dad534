export * from './codec';
export { telemetrySchema, telemetryToGeoInput, type Telemetry } from './schemas/telemetry.schemas';
export {
  FrameSealer,
  FrameSealError,
  DEFAULT_ASSOCIATED_DATA,
} from './services/FrameSealer';
export { UdpFrameSink, type FrameSink } from './services/UdpFrameSink';
export {
  TrackBridgeService,
  type BridgeOutcome,
  type BridgeStats,
  type RejectReason,
  type TrackBridgeOptions,
} from './services/TrackBridgeService';
