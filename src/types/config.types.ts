/**
 * Configuration type definitions
 */

export interface ServerConfig {
  env: 'development' | 'production' | 'test';
}

export interface RedisConfig {
  url: string;
  tls: {
    rejectUnauthorized: boolean;
    ca?: string;
    cert?: string;
    key?: string;
  };
}

export interface SinkConfig {
  host: string;
  port: number;
}

export interface SealingConfig {
  pskHex?: string;
  associatedData: string;
}

export interface BridgeConfig {
  enabled: boolean;
  subscribePattern: string;
  sink: SinkConfig;
  sealing: SealingConfig;
}

export interface AppConfig {
  server: ServerConfig;
  redis: RedisConfig;
  bridge: BridgeConfig;
}
