import path from 'path';
import { OAuthConfig } from './types/auth.js';
import { ConfigError } from './types/errors.js';
import { DEFAULT_PROMPT } from './services/output.js';
import { DEFAULT_API_BASE } from './services/smartthings.js';

export interface AppConfig {
  oauth: OAuthConfig;
  apiBase: string;
  deviceId: string;
  captureDir: string;
  settleDelayMs: number;
  liveIntervalSec: number;
  httpTimeoutMs: number;
  prompt: string;
  writePrompt: boolean;
  debugHttp: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    oauth: {
      clientId: env.SMARTTHINGS_CLIENT_ID || '',
      clientSecret: env.SMARTTHINGS_CLIENT_SECRET || '',
      redirectUri: env.SMARTTHINGS_REDIRECT_URI || 'http://localhost:3000/oauth/callback',
      scope: env.SMARTTHINGS_SCOPE || 'r:devices:* x:devices:*',
      tokenStoragePath: path.resolve(env.TOKEN_FILE || path.join('data', 'token.txt')),
    },
    apiBase: env.SMARTTHINGS_API_BASE || DEFAULT_API_BASE,
    deviceId: env.SMARTTHINGS_DEVICE_ID || '',
    captureDir: path.resolve(env.CAPTURE_DIR || 'captures'),
    settleDelayMs: readNumber(env, 'SETTLE_DELAY_MS', 3000, 0),
    liveIntervalSec: readNumber(env, 'LIVE_INTERVAL_SEC', 10, 1),
    httpTimeoutMs: readNumber(env, 'HTTP_TIMEOUT_MS', 30000, 1),
    prompt: env.VLM_PROMPT || DEFAULT_PROMPT,
    writePrompt: readBoolean(env, 'WRITE_PROMPT', true),
    debugHttp: readBoolean(env, 'DEBUG_HTTP', false),
  };
}

export function requireCredentials(config: AppConfig): void {
  if (!config.oauth.clientId || !config.oauth.clientSecret) {
    throw new ConfigError('Missing SMARTTHINGS_CLIENT_ID or SMARTTHINGS_CLIENT_SECRET. Please check .env.example for setup instructions.');
  }
}

export function requireDevice(config: AppConfig): string {
  if (!config.deviceId) {
    throw new ConfigError('Missing SMARTTHINGS_DEVICE_ID. Run "devices" to list available device IDs.');
  }
  return config.deviceId;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigError(`Invalid ${name}: "${raw}" (expected a number >= ${min})`);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (['true', '1', 'yes'].includes(raw.toLowerCase())) {
    return true;
  }
  if (['false', '0', 'no'].includes(raw.toLowerCase())) {
    return false;
  }
  throw new ConfigError(`Invalid ${name}: "${raw}" (expected true or false)`);
}
