import type { AppConfig } from '../types/config.types.js';

export const DEFAULT_MODEL_ID = 'amazon.titan-text-lite-v1:0:4k';
export const DEFAULT_REGION = 'eu-west-1';

export const DEFAULT_CONFIG: AppConfig = {
  aws: {
    accessKeyId: '',
    secretAccessKey: '',
    endpointUrl: '',
    region: DEFAULT_REGION,
  },
  modelId: DEFAULT_MODEL_ID,
  api: {
    port: 8000,
    host: '127.0.0.1',
  },
  stream: {
    controlFrames: 'terminate',
  },
  logLevel: 'info',
};
