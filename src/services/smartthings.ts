import fs from 'fs/promises';
import path from 'path';
import { TokenManager } from './auth.js';
import { HttpClient, HttpMethod, bearer, isSuccess, parseJson } from './http.js';
import {
  CapabilityReference,
  DeviceCapabilities,
  DeviceHandle,
  DeviceSummary,
  buildCommandRequest,
} from '../types/smartthings.js';
import { AuthFailedError, TransportError, errorMessage } from '../types/errors.js';

export const DEFAULT_API_BASE = 'https://api.smartthings.com/v1';

export interface ApiResponse {
  status: number;
  body: Buffer;
  data: unknown;
}

/**
 * Authenticated access to the SmartThings REST API.
 *
 * Every call is retried exactly once after a token refresh when the
 * first attempt is answered with 401.
 */
export class SmartThingsApi {
  private http: HttpClient;
  private tokens: TokenManager;
  private apiBase: string;
  private log: (line: string) => void;

  constructor(http: HttpClient, tokens: TokenManager, apiBase: string = DEFAULT_API_BASE, log?: (line: string) => void) {
    this.http = http;
    this.tokens = tokens;
    this.apiBase = apiBase.replace(/\/+$/, '');
    this.log = log ?? console.log;
  }

  device(deviceId: string): DeviceHandle {
    return { deviceId, apiBase: this.apiBase };
  }

  async ensureToken(): Promise<string> {
    try {
      return await this.tokens.getValidToken();
    } catch (error) {
      throw new AuthFailedError(`No valid access token: ${errorMessage(error)}`);
    }
  }

  async call(method: HttpMethod, url: string, body?: object): Promise<ApiResponse> {
    const response = await this.withAuthRetry(
      (headers) => this.http.request(method, url, { ...headers, 'Accept': 'application/json' }, body),
      (result) => result.status === 401
    );
    return { ...response, data: parseJson(response.body) };
  }

  async download(url: string, destination: string): Promise<void> {
    await this.withAuthRetry(
      async (headers): Promise<'ok' | 'unauthorized'> => {
        try {
          await this.http.download(url, headers, destination);
          return 'ok';
        } catch (error) {
          if (error instanceof TransportError && error.status === 401) {
            return 'unauthorized';
          }
          throw error;
        }
      },
      (result) => result === 'unauthorized'
    );
  }

  async sendCommand(device: DeviceHandle, capability: string, command: string): Promise<ApiResponse> {
    return this.call('POST', deviceUrl(device, 'commands'), buildCommandRequest(capability, command));
  }

  async getStatus(device: DeviceHandle): Promise<ApiResponse> {
    return this.call('GET', deviceUrl(device, 'status'));
  }

  async getDevice(device: DeviceHandle): Promise<ApiResponse> {
    return this.call('GET', deviceUrl(device));
  }

  async listDevices(): Promise<DeviceSummary[]> {
    const response = await this.call('GET', `${this.apiBase}/devices`);
    if (!isSuccess(response.status)) {
      throw new Error(`Failed to fetch devices: HTTP ${response.status}`);
    }
    return readDeviceItems(response.data);
  }

  async getCapabilities(device: DeviceHandle): Promise<CapabilityReference[]> {
    const response = await this.call('GET', deviceUrl(device, 'components/main/capabilities'));
    if (isSuccess(response.status)) {
      return readCapabilities(response.data);
    }

    this.log(`⚠️ Capability listing returned HTTP ${response.status}, falling back to device details`);
    const details = await this.getDevice(device);
    if (!isSuccess(details.status)) {
      throw new Error(`Failed to fetch capabilities for device ${device.deviceId}: HTTP ${details.status}`);
    }
    return readMainComponentCapabilities(details.data);
  }

  /**
   * Checks the token against the device status endpoint. A body with a
   * components object counts as valid.
   */
  /**
   * Checks the token against the device status. An AuthFailedError, raised
   * once the single refresh-and-retry has already failed, propagates; any
   * other failure reports the token as invalid.
   */
  async validateToken(device: DeviceHandle): Promise<boolean> {
    try {
      const response = await this.getStatus(device);
      return isSuccess(response.status) && hasComponents(response.data);
    } catch (error) {
      if (error instanceof AuthFailedError) {
        throw error;
      }
      this.log(`⚠️ Token validation failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async exportCapabilities(outputPath: string): Promise<Record<string, DeviceCapabilities>> {
    const devices = await this.listDevices();
    const output: Record<string, DeviceCapabilities> = {};

    for (const summary of devices) {
      const name = summary.label || summary.name || summary.deviceId;
      let capabilities: CapabilityReference[] = [];
      try {
        capabilities = await this.getCapabilities(this.device(summary.deviceId));
      } catch (error) {
        if (error instanceof AuthFailedError) {
          throw error;
        }
        this.log(`⚠️ Failed to fetch capabilities for device ${summary.deviceId}: ${errorMessage(error)}`);
      }
      output[name] = { deviceId: summary.deviceId, capabilities };
    }

    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, JSON.stringify(output, null, 4));
    this.log(`✓ Capabilities of ${Object.keys(output).length} devices saved to ${outputPath}`);
    return output;
  }

  private async withAuthRetry<T>(
    send: (headers: Record<string, string>) => Promise<T>,
    isUnauthorized: (result: T) => boolean
  ): Promise<T> {
    const token = await this.ensureToken();
    const first = await send(bearer(token));
    if (!isUnauthorized(first)) {
      return first;
    }

    this.log('⚠️ Received 401 Unauthorized, refreshing token and retrying...');
    let refreshed: string;
    try {
      refreshed = await this.tokens.refresh(token);
    } catch (error) {
      throw new AuthFailedError(`Token expired, refresh failed: check credentials (${errorMessage(error)})`);
    }

    const second = await send(bearer(refreshed));
    if (isUnauthorized(second)) {
      this.log('✗ Still unauthorized after token refresh');
      throw new AuthFailedError('Request still unauthorized after token refresh');
    }
    return second;
  }
}

export function deviceUrl(device: DeviceHandle, suffix?: string): string {
  const base = `${device.apiBase.replace(/\/+$/, '')}/devices/${encodeURIComponent(device.deviceId)}`;
  return suffix ? `${base}/${suffix}` : base;
}

function isRecord(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasComponents(data: unknown): boolean {
  return isRecord(data) && isRecord(data.components);
}

function readDeviceItems(data: unknown): DeviceSummary[] {
  if (!isRecord(data) || !Array.isArray(data.items)) {
    return [];
  }
  const devices: DeviceSummary[] = [];
  for (const item of data.items) {
    if (!isRecord(item) || typeof item.deviceId !== 'string') {
      continue;
    }
    devices.push({
      deviceId: item.deviceId,
      name: typeof item.name === 'string' ? item.name : undefined,
      label: typeof item.label === 'string' ? item.label : undefined,
    });
  }
  return devices;
}

function readCapabilities(data: unknown): CapabilityReference[] {
  const list = Array.isArray(data) ? data : isRecord(data) && Array.isArray(data.items) ? data.items : [];
  const capabilities: CapabilityReference[] = [];
  for (const entry of list) {
    if (typeof entry === 'string') {
      capabilities.push({ id: entry });
    } else if (isRecord(entry) && typeof entry.id === 'string') {
      capabilities.push({
        id: entry.id,
        version: typeof entry.version === 'number' ? entry.version : undefined,
      });
    }
  }
  return capabilities;
}

function readMainComponentCapabilities(data: unknown): CapabilityReference[] {
  if (!isRecord(data) || !Array.isArray(data.components)) {
    return [];
  }
  const main = data.components.find((component: unknown) => isRecord(component) && component.id === 'main');
  return isRecord(main) ? readCapabilities(main.capabilities) : [];
}
