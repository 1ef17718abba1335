import dotenv from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { ConfigError } from '../lib/errors';

export const DEFAULT_ESXI_USER = 'root';

export type SmtpConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  from: string;
  to: string;
};

export type Config = {
  org: string;
  esxi: {
    user: string;
    password: string;
    port: number;
    commandTimeoutMs: number;
  };
  run: {
    haltOnFailure: boolean;
  };
  smtp?: SmtpConfig;
};

type EnvSource = Record<string, string | undefined>;

const toNumber = (value: string, key: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`Env var ${key} must be a positive integer`);
  }
  return parsed;
};

const toBoolean = (value: string, key: string): boolean => {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y'].includes(normalized)) return true;
  if (['false', '0', 'no', 'n'].includes(normalized)) return false;
  throw new ConfigError(`Env var ${key} must be boolean-like (yes/no)`);
};

/**
 * Builds the run configuration from already parsed key/value pairs.
 * Mail settings are only required once mail is switched on.
 */
export function buildConfig(env: EnvSource): Config {
  const getEnvOptional = (key: string): string | undefined => {
    const value = env[key];
    if (!value) return undefined;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  };

  const getEnv = (key: string, fallback?: string): string => {
    const value = getEnvOptional(key) ?? fallback;
    if (!value) {
      throw new ConfigError(`Missing required env var ${key}`);
    }
    return value;
  };

  const isEnabled = (key: string): boolean => getEnvOptional(key)?.toLowerCase() === 'yes';

  const smtp: SmtpConfig | undefined = isEnabled('USE_SMTP')
    ? {
        host: getEnv('SMTP_HOST'),
        port: toNumber(getEnv('SMTP_PORT'), 'SMTP_PORT'),
        user: getEnv('SMTP_USER'),
        password: getEnv('SMTP_PASS'),
        from: getEnv('SMTP_FROM'),
        to: getEnv('SMTP_TO'),
      }
    : undefined;

  return {
    org: getEnv('ORG'),
    esxi: {
      user: getEnv('ESXI_USER', DEFAULT_ESXI_USER),
      password: getEnv('ESXI_PASS'),
      port: toNumber(getEnv('ESXI_PORT', '22'), 'ESXI_PORT'),
      commandTimeoutMs: toNumber(getEnv('ESXI_COMMAND_TIMEOUT_MS', '60000'), 'ESXI_COMMAND_TIMEOUT_MS'),
    },
    run: {
      haltOnFailure: toBoolean(getEnv('HALT_ON_FAILURE', 'no'), 'HALT_ON_FAILURE'),
    },
    smtp,
  };
}

/** Reads an env file without touching `process.env`. */
export function loadConfig(envPath: string): Config {
  if (!existsSync(envPath)) {
    throw new ConfigError(`Env file not found: ${envPath}`);
  }
  return buildConfig(dotenv.parse(readFileSync(envPath)));
}
