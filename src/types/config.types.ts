import type { ControlFramePolicy } from './inference.types.js';

export interface AwsConfig {
  accessKeyId: string;
  secretAccessKey: string;
  endpointUrl: string;
  region: string;
}

export interface ApiConfig {
  port: number;
  host: string;
}

export interface StreamConfig {
  controlFrames: ControlFramePolicy;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  aws: AwsConfig;
  modelId: string;
  api: ApiConfig;
  stream: StreamConfig;
  logLevel: LogLevel;
}
