import { AppConfig } from './config.js';
import { TokenManager } from './services/auth.js';
import { CaptureController } from './services/capture.js';
import { AxiosHttpClient, HttpClient } from './services/http.js';
import { SmartThingsApi } from './services/smartthings.js';
import { TokenStore } from './services/token-store.js';

export interface AppContext {
  config: AppConfig;
  http: HttpClient;
  tokens: TokenManager;
  api: SmartThingsApi;
  capture: CaptureController;
  log: (line: string) => void;
}

export interface ContextOverrides {
  http?: HttpClient;
  store?: TokenStore;
  log?: (line: string) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function createContext(config: AppConfig, overrides: ContextOverrides = {}): AppContext {
  const log = overrides.log ?? console.log;
  const http = overrides.http ?? new AxiosHttpClient({
    timeoutMs: config.httpTimeoutMs,
    debug: config.debugHttp,
    log,
  });
  const tokens = new TokenManager({ config: config.oauth, http, store: overrides.store, log });
  const api = new SmartThingsApi(http, tokens, config.apiBase, log);
  const capture = new CaptureController(api, {
    captureDir: config.captureDir,
    settleDelayMs: config.settleDelayMs,
    writePrompt: config.writePrompt,
    prompt: config.prompt,
    sleep: overrides.sleep,
    log,
  });

  return { config, http, tokens, api, capture, log };
}
