import type Redis from 'ioredis';
import config from '../config';
import logger from '../utils/logger';
import redisClientManager from '../lib/redis/RedisClientManager';
import { FrameSealer } from '../services/FrameSealer';
import { TrackBridgeService } from '../services/TrackBridgeService';
import { UdpFrameSink, type FrameSink } from '../services/UdpFrameSink';

const SUBSCRIBER_NAME = 'bridge:subscriber';

const {
  redis: { url: redisUrl },
  bridge: { subscribePattern, sink: sinkConfig, sealing },
} = config;

let subscriber: Redis | null = null;
let bridge: TrackBridgeService | null = null;
let sink: FrameSink | null = null;
const inFlight = new Set<Promise<void>>();

export function createBridgeService(frameSink: FrameSink): TrackBridgeService {
  const sealer = sealing.pskHex ? FrameSealer.fromPskHex(sealing.pskHex) : undefined;
  return new TrackBridgeService({
    sink: frameSink,
    sealer,
    associatedData: sealing.associatedData,
  });
}

function onPatternMessage(_pattern: string, channel: string, message: string): void {
  const service = bridge;
  if (!service) {
    return;
  }
  const task: Promise<void> = service.handlePayload(message, channel)
    .then(() => undefined)
    .catch((error: unknown) => {
      logger.error('Unexpected error while bridging telemetry', {
        channel,
        error: error instanceof Error ? error.message : String(error),
      });
    })
    .finally(() => {
      inFlight.delete(task);
    });
  inFlight.add(task);
}

/**
 * Subscribes to the telemetry pattern and forwards every message as a frame.
 * Resolves once the subscription is active; returns null when disabled.
 */
export async function startTrackBridgeWorker(
  frameSink: FrameSink = new UdpFrameSink(sinkConfig.host, sinkConfig.port),
): Promise<TrackBridgeService | null> {
  if (!config.bridge.enabled) {
    logger.warn('Track bridge worker not started because the bridge is disabled');
    return null;
  }
  if (bridge) {
    return bridge;
  }

  const service = createBridgeService(frameSink);
  const client = redisClientManager.getClient(SUBSCRIBER_NAME, redisUrl);
  bridge = service;
  client.on('pmessage', onPatternMessage);
  try {
    await client.psubscribe(subscribePattern);
  } catch (error) {
    client.off('pmessage', onPatternMessage);
    bridge = null;
    await redisClientManager.disconnect(SUBSCRIBER_NAME).catch((disconnectError: unknown) => {
      logger.warn('Error closing Redis subscriber after failed subscribe', {
        error: disconnectError instanceof Error ? disconnectError.message : String(disconnectError),
      });
    });
    throw error;
  }
  sink = frameSink;
  subscriber = client;

  logger.info('Track bridge worker subscribed', {
    pattern: subscribePattern,
    sink: `${sinkConfig.host}:${sinkConfig.port}`,
    sealed: service.isSealing(),
  });
  return service;
}

export async function stopTrackBridgeWorker(): Promise<void> {
  if (subscriber) {
    subscriber.off('pmessage', onPatternMessage);
    try {
      await subscriber.punsubscribe(subscribePattern);
    } catch (error) {
      logger.warn('Error unsubscribing bridge worker', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    try {
      await redisClientManager.disconnect(SUBSCRIBER_NAME);
    } catch (error) {
      logger.warn('Error closing Redis subscriber in bridge worker', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    subscriber = null;
  }

  await Promise.all(Array.from(inFlight));

  if (bridge) {
    logger.info('Track bridge worker stopped', bridge.getStats());
    bridge = null;
  }
  if (sink) {
    await sink.close();
    sink = null;
  }
}

if (require.main === module) {
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down track bridge`);
    await stopTrackBridgeWorker();
    process.exit(0);
  };
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch(() => process.exit(1));
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch(() => process.exit(1));
  });

  startTrackBridgeWorker().catch((error: Error) => {
    logger.error('Fatal error in track bridge worker', { error: error.message });
    process.exit(1);
  });
}
