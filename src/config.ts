/**
 * Webhook configuration from the environment. Invalid values throw ConfigError
 * naming the variable; the entrypoint turns that into EXIT_CONFIG.
 */

import { MAX_PORT, MIN_PORT } from './constants.js';
import type { LogLevel } from './logger.js';
import { isLogLevel, LOG_LEVELS } from './logger.js';
import type { InjectorOptions } from './types.js';
import { DEFAULT_INJECTOR_OPTIONS } from './types.js';

export const DEFAULT_PORT = 8443;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export interface TlsFiles {
  certFile: string;
  keyFile: string;
}

export interface WebhookConfig {
  port: number;
  /** HTTPS when set; plain HTTP (e.g. behind a TLS-terminating proxy) otherwise. */
  tls?: TlsFiles;
  logLevel: LogLevel;
  injector: Readonly<InjectorOptions>;
}

type Env = Record<string, string | undefined>;

function read(env: Env, key: string): string | undefined {
  const value = env[key];
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

function parsePort(env: Env, key: string, fallback: number): number {
  const raw = read(env, key);
  if (raw === undefined) return fallback;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < MIN_PORT || port > MAX_PORT) {
    throw new ConfigError(`${key} must be an integer between ${MIN_PORT} and ${MAX_PORT}, got "${raw}"`, key);
  }
  return port;
}

export function loadConfig(env: Env = process.env): WebhookConfig {
  const port = parsePort(env, 'PORT', DEFAULT_PORT);

  const certFile = read(env, 'TLS_CERT_FILE');
  const keyFile = read(env, 'TLS_KEY_FILE');
  if ((certFile === undefined) !== (keyFile === undefined)) {
    throw new ConfigError(
      'TLS_CERT_FILE and TLS_KEY_FILE must be set together',
      certFile === undefined ? 'TLS_CERT_FILE' : 'TLS_KEY_FILE'
    );
  }

  const logLevel = read(env, 'LOG_LEVEL') ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`, 'LOG_LEVEL');
  }

  const injector: InjectorOptions = {
    helperImage: read(env, 'HELPER_IMAGE') ?? DEFAULT_INJECTOR_OPTIONS.helperImage,
    initImage: read(env, 'INIT_IMAGE') ?? DEFAULT_INJECTOR_OPTIONS.initImage,
    proxyImage: read(env, 'PROXY_IMAGE') ?? DEFAULT_INJECTOR_OPTIONS.proxyImage,
    debugUiImage: read(env, 'DEBUG_UI_IMAGE') ?? DEFAULT_INJECTOR_OPTIONS.debugUiImage,
    agentXdsService: read(env, 'AGENT_XDS_SERVICE') ?? DEFAULT_INJECTOR_OPTIONS.agentXdsService,
    agentXdsPort: parsePort(env, 'AGENT_XDS_PORT', DEFAULT_INJECTOR_OPTIONS.agentXdsPort),
  };

  return {
    port,
    ...(certFile !== undefined && keyFile !== undefined && { tls: { certFile, keyFile } }),
    logLevel,
    injector: Object.freeze(injector),
  };
}
