/**
 * Configuration type definitions
 */

export interface ServerConfig {
  port: number;
  env: 'development' | 'production' | 'test';
  host: string;
}

export interface ExternalApiConfig {
  opensky: {
    baseUrl: string;
    tokenUrl: string;
    timeoutMs: number;
  };
}

export interface TrafficConfig {
  timeSpanInDays: number;
  statesTtlSeconds: number;
  connectionsTtlSeconds: number;
  cacheMaxEntries: number;
}

export interface PublisherConfig {
  enabled: boolean;
  redisUrl: string;
  channelPrefix: string;
  airports: string[];
  intervalSeconds: number;
}

export interface AppConfig {
  server: ServerConfig;
  external: ExternalApiConfig;
  traffic: TrafficConfig;
  publisher: PublisherConfig;
}
