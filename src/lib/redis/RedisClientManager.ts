import Redis, { RedisOptions } from 'ioredis';
import config from '../../config';
import logger from '../../utils/logger';

export interface ConnectionMeta {
  status: 'connecting' | 'ready' | 'reconnecting' | 'error' | 'closed';
  lastError?: string;
  createdAt: Date;
}

interface ManagedConnection {
  client: Redis;
  meta: ConnectionMeta;
}

const DEFAULT_OPTIONS: RedisOptions = {
  maxRetriesPerRequest: null,
  enableReadyCheck: true,
  lazyConnect: true,
};

function tlsOptionsFor(url: string): RedisOptions['tls'] {
  let protocol: string;
  try {
    ({ protocol } = new URL(url));
  } catch (error) {
    logger.warn('Failed to parse Redis URL for TLS configuration', {
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
  if (protocol !== 'rediss:') {
    return undefined;
  }
  const { rejectUnauthorized, ca, cert, key } = config.redis.tls;
  return {
    rejectUnauthorized,
    ...(ca ? { ca } : {}),
    ...(cert ? { cert } : {}),
    ...(key ? { key } : {}),
  };
}

/**
 * Named, shared ioredis connections. A subscriber needs its own connection
 * because ioredis blocks regular commands once it enters subscriber mode.
 */
export class RedisClientManager {
  private connections = new Map<string, ManagedConnection>();

  getClient(name: string, url: string = config.redis.url, overrides: RedisOptions = {}): Redis {
    const existing = this.connections.get(name);
    if (existing) {
      return existing.client;
    }

    const tls = tlsOptionsFor(url);
    const options: RedisOptions = { ...DEFAULT_OPTIONS, ...(tls ? { tls } : {}), ...overrides };

    const client = new Redis(url, options);
    const meta: ConnectionMeta = {
      status: 'connecting',
      createdAt: new Date(),
    };
    this.connections.set(name, { client, meta });

    client.on('ready', () => {
      meta.status = 'ready';
      meta.lastError = undefined;
      logger.info('Redis client ready', { name });
    });

    client.on('error', (error: Error) => {
      meta.status = 'error';
      meta.lastError = error.message;
      logger.error('Redis client error', { name, error: error.message });
    });

    client.on('reconnecting', () => {
      meta.status = 'reconnecting';
      logger.warn('Redis client reconnecting', { name });
    });

    client.on('close', () => {
      meta.status = 'closed';
      logger.warn('Redis client connection closed', { name });
    });

    client.connect().catch((error: Error) => {
      meta.status = 'error';
      meta.lastError = error.message;
      logger.error('Redis client failed to connect', { name, error: error.message });
    });

    return client;
  }

  getHealth(): Record<string, ConnectionMeta> {
    const result: Record<string, ConnectionMeta> = {};
    for (const [name, connection] of this.connections.entries()) {
      result[name] = { ...connection.meta };
    }
    return result;
  }

  async disconnect(name?: string): Promise<void> {
    if (name) {
      const managed = this.connections.get(name);
      if (managed) {
        this.connections.delete(name);
        await managed.client.quit();
      }
      return;
    }

    const entries = Array.from(this.connections.values());
    this.connections.clear();
    await Promise.all(entries.map(async ({ client }) => client.quit()));
  }
}

const redisClientManager = new RedisClientManager();

export default redisClientManager;
