import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import type { AppConfig } from '../types/config.types';

const rootEnvPath = path.resolve(__dirname, '../../.env');
if (fs.existsSync(rootEnvPath)) {
  dotenv.config({ path: rootEnvPath });
}

dotenv.config();

const parseEnv = (value: string | undefined): AppConfig['server']['env'] => {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
};

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const resolveBooleanFlag = (
  enableKey: string | undefined,
  disableKey: string | undefined,
  defaultValue: boolean,
): boolean => {
  if (enableKey !== undefined) {
    return enableKey === 'true';
  }
  if (disableKey !== undefined) {
    return disableKey !== 'true';
  }
  return defaultValue;
};

const readFile = (filePath?: string): string | undefined => {
  if (!filePath || !fs.existsSync(filePath)) {
    return undefined;
  }
  return fs.readFileSync(filePath, 'utf8');
};

const sinkPort = parseNumber(process.env.BRIDGE_SINK_PORT, 5000);

/**
 * Centralized configuration; every environment variable is read here
 */
const config: AppConfig = {
  server: {
    env: parseEnv(process.env.NODE_ENV),
  },
  redis: {
    url: process.env.REDIS_URL || 'redis://127.0.0.1:6379',
    tls: {
      rejectUnauthorized: process.env.REDIS_REJECT_UNAUTHORIZED === 'true',
      ca: process.env.REDIS_TLS_CA || readFile(process.env.REDIS_TLS_CA_PATH),
      cert: process.env.REDIS_TLS_CERT || readFile(process.env.REDIS_TLS_CERT_PATH),
      key: process.env.REDIS_TLS_KEY || readFile(process.env.REDIS_TLS_KEY_PATH),
    },
  },
  bridge: {
    enabled: resolveBooleanFlag(process.env.ENABLE_BRIDGE, process.env.DISABLE_BRIDGE, true),
    subscribePattern: process.env.BRIDGE_SUBSCRIBE_PATTERN || 'drone:*',
    sink: {
      host: process.env.BRIDGE_SINK_HOST || '127.0.0.1',
      port: sinkPort > 0 && sinkPort <= 65535 ? sinkPort : 5000,
    },
    sealing: {
      pskHex: process.env.BRIDGE_PSK_HEX || undefined,
      associatedData: process.env.BRIDGE_ASSOCIATED_DATA || 'j3.2',
    },
  },
};

export default config;
