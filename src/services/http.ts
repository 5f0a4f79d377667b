import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import fs from 'fs';
import { mkdir, rename, rm } from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { TransportError } from '../types/errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpResponse {
  status: number;
  body: Buffer;
}

/**
 * Transport used by the token manager and the SmartThings API.
 * Non-2xx statuses are returned, not thrown; only transport failures throw.
 */
export interface HttpClient {
  request(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body?: string | object
  ): Promise<HttpResponse>;
  download(url: string, headers: Record<string, string>, destination: string): Promise<void>;
}

export interface HttpClientOptions {
  timeoutMs?: number;
  userAgent?: string;
  debug?: boolean;
  log?: (line: string) => void;
  instance?: AxiosInstance;
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export function bearer(token: string): Record<string, string> {
  return { 'Authorization': `Bearer ${token}` };
}

export function parseJson(body: Buffer): unknown {
  try {
    return JSON.parse(body.toString('utf-8'));
  } catch {
    return undefined;
  }
}

export class AxiosHttpClient implements HttpClient {
  private client: AxiosInstance;
  private debug: boolean;
  private log: (line: string) => void;

  constructor(options: HttpClientOptions = {}) {
    this.debug = options.debug ?? false;
    this.log = options.log ?? console.log;
    this.client = options.instance ?? axios.create({
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'User-Agent': options.userAgent ?? 'SmartThings Camera Console',
      },
    });
  }

  async request(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body?: string | object
  ): Promise<HttpResponse> {
    const config: AxiosRequestConfig = {
      method,
      url,
      headers: { ...headers },
      responseType: 'arraybuffer',
      validateStatus: () => true,
    };

    if (body !== undefined) {
      config.data = typeof body === 'string' ? body : JSON.stringify(body);
      if (typeof body !== 'string' && !hasHeader(headers, 'content-type')) {
        config.headers = { ...headers, 'Content-Type': 'application/json' };
      }
    }

    try {
      const response = await this.client.request<ArrayBuffer>(config);
      if (this.debug) {
        this.log(`${method} ${url} -> ${response.status}`);
      }
      return { status: response.status, body: Buffer.from(response.data) };
    } catch (error) {
      throw toTransportError(error, url);
    }
  }

  async download(url: string, headers: Record<string, string>, destination: string): Promise<void> {
    await mkdir(path.dirname(destination), { recursive: true });
    const tempPath = `${destination}.${process.pid}.${Date.now()}.part`;

    try {
      const response = await this.client.request<Readable>({
        method: 'GET',
        url,
        headers: { ...headers },
        responseType: 'stream',
        validateStatus: () => true,
      });

      if (this.debug) {
        this.log(`GET ${url} -> ${response.status}`);
      }

      if (!isSuccess(response.status)) {
        response.data.destroy();
        throw new TransportError(`Download failed with HTTP ${response.status}`, url, response.status);
      }

      await pipeline(response.data, fs.createWriteStream(tempPath));
      await rename(tempPath, destination);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw toTransportError(error, url);
    }
  }
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  return Object.keys(headers).some(key => key.toLowerCase() === name);
}

function toTransportError(error: unknown, url: string): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const code = error.code ? ` (${error.code})` : '';
    return new TransportError(`Request to ${url} failed: ${error.message}${code}`, url);
  }
  if (error instanceof Error) {
    return new TransportError(`Request to ${url} failed: ${error.message}`, url);
  }
  return new TransportError(`Request to ${url} failed`, url);
}
