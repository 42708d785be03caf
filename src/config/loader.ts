import type { AppConfig } from '../types/config.types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigValidationError } from './validator.js';
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const controlFramesSchema = z.enum(['terminate', 'skip']);

const fileConfigSchema = z
  .object({
    aws: z
      .object({
        accessKeyId: z.string(),
        secretAccessKey: z.string(),
        endpointUrl: z.string(),
        region: z.string(),
      })
      .partial(),
    modelId: z.string(),
    api: z.object({ port: z.number().int(), host: z.string() }).partial(),
    stream: z.object({ controlFrames: controlFramesSchema }).partial(),
    logLevel: logLevelSchema,
  })
  .partial();

type FileConfig = z.infer<typeof fileConfigSchema>;

export const CONFIG_FILE_NAMES = ['.titan-relay.json', 'titan-relay.config.json'] as const;

function loadFileConfig(cwd: string): FileConfig {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, name);
    if (!existsSync(candidate)) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(candidate, 'utf-8'));
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConfigValidationError(`Unable to read ${candidate}: ${detail}`);
    }
    const parsed = fileConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigValidationError(
        `Invalid ${name}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown error'}`,
      );
    }
    return parsed.data;
  }
  return {};
}

function parseEnum<T extends string>(
  schema: z.ZodType<T>,
  envVar: string,
  value: string,
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigValidationError(`${envVar} has unsupported value "${value}".`);
  }
  return parsed.data;
}

function loadEnvOverrides(env: NodeJS.ProcessEnv): FileConfig {
  const overrides: FileConfig = {};

  const accessKeyId = env['AWS_ACCESS_KEY_ID'];
  const secretAccessKey = env['AWS_SECRET_ACCESS_KEY'];
  const endpointUrl = env['AWS_URL'];
  if (accessKeyId || secretAccessKey || endpointUrl) {
    overrides.aws = {
      ...(accessKeyId ? { accessKeyId } : {}),
      ...(secretAccessKey ? { secretAccessKey } : {}),
      ...(endpointUrl ? { endpointUrl } : {}),
    };
  }

  const modelId = env['TITAN_MODEL_ID'];
  if (modelId) {
    overrides.modelId = modelId;
  }

  const port = env['TITAN_RELAY_PORT'];
  const host = env['TITAN_RELAY_HOST'];
  if (port || host) {
    overrides.api = {
      ...(port ? { port: parseInt(port, 10) } : {}),
      ...(host ? { host } : {}),
    };
  }

  const logLevel = env['TITAN_RELAY_LOG_LEVEL'];
  if (logLevel) {
    overrides.logLevel = parseEnum(logLevelSchema, 'TITAN_RELAY_LOG_LEVEL', logLevel);
  }

  const controlFrames = env['TITAN_RELAY_CONTROL_FRAMES'];
  if (controlFrames) {
    overrides.stream = {
      controlFrames: parseEnum(controlFramesSchema, 'TITAN_RELAY_CONTROL_FRAMES', controlFrames),
    };
  }

  return overrides;
}

function merge(base: AppConfig, override: FileConfig): AppConfig {
  return {
    aws: { ...base.aws, ...override.aws },
    modelId: override.modelId ?? base.modelId,
    api: { ...base.api, ...override.api },
    stream: { ...base.stream, ...override.stream },
    logLevel: override.logLevel ?? base.logLevel,
  };
}

/**
 * Resolves configuration from defaults, then the first config file found in
 * `cwd`, then environment variables. Does not check that secrets are present;
 * call `validateConfig` for that.
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const fileConfig = loadFileConfig(cwd);
  const envOverrides = loadEnvOverrides(env);

  return merge(merge(DEFAULT_CONFIG, fileConfig), envOverrides);
}
