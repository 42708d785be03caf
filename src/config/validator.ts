import type { AppConfig } from '../types/config.types.js';

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const REQUIRED_SECRETS = [
  ['accessKeyId', 'AWS_ACCESS_KEY_ID'],
  ['secretAccessKey', 'AWS_SECRET_ACCESS_KEY'],
  ['endpointUrl', 'AWS_URL'],
] as const;

export function validateConfig(config: AppConfig): void {
  for (const [key, envVar] of REQUIRED_SECRETS) {
    if (config.aws[key].trim() === '') {
      throw new ConfigValidationError(
        `${envVar} is not set. Export it or provide aws.${key} in .titan-relay.json.`,
      );
    }
  }

  if (!URL.canParse(config.aws.endpointUrl)) {
    throw new ConfigValidationError(`AWS_URL is not a valid URL: ${config.aws.endpointUrl}`);
  }

  if (config.aws.region.trim() === '') {
    throw new ConfigValidationError('aws.region must not be empty.');
  }

  if (config.modelId.trim() === '') {
    throw new ConfigValidationError('modelId must not be empty.');
  }

  if (!Number.isInteger(config.api.port) || config.api.port < 1 || config.api.port > 65535) {
    throw new ConfigValidationError(
      `API port must be between 1 and 65535, got ${config.api.port}.`,
    );
  }
}
