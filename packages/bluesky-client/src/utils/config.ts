/**
 * Environment Configuration
 * Resolves the service endpoint, request deadline and session location.
 */

import * as os from 'os';
import * as path from 'path';
import { DEFAULT_SERVICE_URL } from '../types.js';
import { isLogLevel, type LogLevel } from './logger.js';

export interface SkypostConfig {
  serviceUrl: string;
  timeoutMs: number;
  configDir: string;
  sessionFile: string;
  logLevel: LogLevel;
}

export const SESSION_FILE_NAME = 'session.json';

export const DEFAULT_CONFIG: SkypostConfig = {
  serviceUrl: DEFAULT_SERVICE_URL,
  timeoutMs: 30000,
  configDir: path.join(os.homedir(), '.config', 'skypost'),
  sessionFile: path.join(os.homedir(), '.config', 'skypost', SESSION_FILE_NAME),
  logLevel: 'info',
};

/**
 * Load configuration from environment variables.
 * Unset or unparsable values fall back to the defaults.
 */
export function loadConfigFromEnv(env: Record<string, string | undefined>): SkypostConfig {
  const configDir = env.SKYPOST_CONFIG_DIR || DEFAULT_CONFIG.configDir;
  const level = env.LOG_LEVEL || '';

  return {
    serviceUrl: (env.SKYPOST_SERVICE_URL || DEFAULT_CONFIG.serviceUrl).replace(/\/+$/, ''),
    timeoutMs: parseInt(env.SKYPOST_TIMEOUT_MS || '') || DEFAULT_CONFIG.timeoutMs,
    configDir,
    sessionFile: path.join(configDir, SESSION_FILE_NAME),
    logLevel: isLogLevel(level) ? level : DEFAULT_CONFIG.logLevel,
  };
}

/**
 * Validate configuration has usable values.
 */
export function validateConfig(config: SkypostConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!/^https?:\/\/[^/]+/.test(config.serviceUrl)) {
    errors.push(`serviceUrl must be an http(s) URL, got "${config.serviceUrl}"`);
  }
  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
    errors.push(`timeoutMs must be positive, got ${config.timeoutMs}`);
  }
  if (!config.configDir) {
    errors.push('Missing configDir');
  }

  return { valid: errors.length === 0, errors };
}
