import { describe, expect, it } from 'vitest';
import path from 'path';
import { loadConfig, requireCredentials, requireDevice } from '../../src/config.js';
import { DEFAULT_PROMPT } from '../../src/services/output.js';
import { ConfigError } from '../../src/types/errors.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.oauth).toEqual({
      clientId: '',
      clientSecret: '',
      redirectUri: 'http://localhost:3000/oauth/callback',
      scope: 'r:devices:* x:devices:*',
      tokenStoragePath: path.resolve('data', 'token.txt'),
    });
    expect(config.apiBase).toBe('https://api.smartthings.com/v1');
    expect(config.captureDir).toBe(path.resolve('captures'));
    expect(config.settleDelayMs).toBe(3000);
    expect(config.liveIntervalSec).toBe(10);
    expect(config.httpTimeoutMs).toBe(30000);
    expect(config.prompt).toBe(DEFAULT_PROMPT);
    expect(config.writePrompt).toBe(true);
    expect(config.debugHttp).toBe(false);
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      SMARTTHINGS_CLIENT_ID: 'test-client',
      SMARTTHINGS_CLIENT_SECRET: 'test-secret',
      SMARTTHINGS_DEVICE_ID: 'cam-1',
      SETTLE_DELAY_MS: '1000',
      LIVE_INTERVAL_SEC: '5',
      WRITE_PROMPT: 'false',
      DEBUG_HTTP: 'yes',
      VLM_PROMPT: 'Describe the scene.',
    });

    expect(config.oauth.clientId).toBe('test-client');
    expect(config.deviceId).toBe('cam-1');
    expect(config.settleDelayMs).toBe(1000);
    expect(config.liveIntervalSec).toBe(5);
    expect(config.writePrompt).toBe(false);
    expect(config.debugHttp).toBe(true);
    expect(config.prompt).toBe('Describe the scene.');
  });

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ SETTLE_DELAY_MS: 'soon' })).toThrow(
      new ConfigError('Invalid SETTLE_DELAY_MS: "soon" (expected a number >= 0)')
    );
    expect(() => loadConfig({ LIVE_INTERVAL_SEC: '0' })).toThrow(ConfigError);
  });

  it('rejects invalid booleans', () => {
    expect(() => loadConfig({ WRITE_PROMPT: 'maybe' })).toThrow('Invalid WRITE_PROMPT: "maybe" (expected true or false)');
  });

  it('requires client credentials and a device where commands need them', () => {
    const config = loadConfig({});

    expect(() => requireCredentials(config)).toThrow(ConfigError);
    expect(() => requireDevice(config)).toThrow(ConfigError);
    expect(requireDevice(loadConfig({ SMARTTHINGS_DEVICE_ID: 'cam-1' }))).toBe('cam-1');
  });
});
