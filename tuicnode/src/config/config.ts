import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { defaultConfig } from './defaults';
import { ConfigurationError } from '../utils/errors';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggingConfig {
  level: LogLevel;
  file?: string;
}

export interface PathsConfig {
  workDir: string;
  serverConfig: string;
  certificate: string;
  privateKey: string;
  binary: string;
  credentials: string;
}

export interface Config {
  server: {
    port: number;
  };
  paths: PathsConfig;
  logging: LoggingConfig;
  network: {
    timeoutMs: number;
    ipEchoUrls: readonly string[];
    geoUrl: string;
    ipPlaceholder: string;
    unknownCountry: string;
  };
  relay: {
    downloadUrl: string;
    downloadTimeoutMs: number;
  };
  certificate: {
    validityDays: number;
  };
  masquerade: {
    domains: readonly string[];
    seed?: string;
  };
  link: {
    labelPrefix: string;
  };
}

export type Environment = Record<string, string | undefined>;

const envSchema = z.object({
  SERVER_PORT: z.coerce.number().int().min(1).max(65535).default(defaultConfig.server.port),
  WORK_DIR: z.string().min(1).default(defaultConfig.workDir),
  LOG_LEVEL: z.enum(LOG_LEVELS).default(defaultConfig.logging.level),
  LOG_FILE: z.string().min(1).optional(),
  MASQUERADE_SEED: z.string().min(1).optional(),
  NETWORK_TIMEOUT_MS: z.coerce.number().int().positive().default(defaultConfig.network.timeoutMs),
  DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(defaultConfig.relay.downloadTimeoutMs),
});

/**
 * Empty strings count as unset, the same way `${VAR:-default}` does in a shell.
 */
function withoutEmptyValues(env: Environment): Environment {
  const result: Environment = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export function loadConfig(env: Environment): Readonly<Config> {
  const parsed = envSchema.safeParse(withoutEmptyValues(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  const workDir = vars.WORK_DIR;
  const files = defaultConfig.files;

  return deepFreeze<Config>({
    server: {
      port: vars.SERVER_PORT,
    },
    paths: {
      workDir,
      serverConfig: path.join(workDir, files.serverConfig),
      certificate: path.join(workDir, files.certificate),
      privateKey: path.join(workDir, files.privateKey),
      binary: path.join(workDir, files.binary),
      credentials: path.join(workDir, files.credentials),
    },
    logging: {
      level: vars.LOG_LEVEL,
      file: vars.LOG_FILE,
    },
    network: {
      timeoutMs: vars.NETWORK_TIMEOUT_MS,
      ipEchoUrls: [...defaultConfig.network.ipEchoUrls],
      geoUrl: defaultConfig.network.geoUrl,
      ipPlaceholder: defaultConfig.network.ipPlaceholder,
      unknownCountry: defaultConfig.network.unknownCountry,
    },
    relay: {
      downloadUrl: defaultConfig.relay.downloadUrl,
      downloadTimeoutMs: vars.DOWNLOAD_TIMEOUT_MS,
    },
    certificate: {
      validityDays: defaultConfig.certificate.validityDays,
    },
    masquerade: {
      domains: [...defaultConfig.masqueradeDomains],
      seed: vars.MASQUERADE_SEED,
    },
    link: {
      labelPrefix: defaultConfig.link.labelPrefix,
    },
  });
}

/**
 * Reads `.env` (if present) into the process environment, then validates it.
 */
export function loadConfigFromProcess(): Readonly<Config> {
  dotenv.config();
  return loadConfig(process.env);
}
