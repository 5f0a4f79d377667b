import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { AxiosHttpClient, isSuccess, parseJson } from '../../src/services/http.js';
import { TransportError } from '../../src/types/errors.js';

type Reply = (config: InternalAxiosRequestConfig) => Promise<Omit<AxiosResponse, 'config'>>;

function clientWith(reply: Reply) {
  const adapter = vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => ({
    ...(await reply(config)),
    config,
  }));
  const instance = axios.create({ adapter });
  return { client: new AxiosHttpClient({ instance }), adapter };
}

function response(status: number, data: unknown): Omit<AxiosResponse, 'config'> {
  return { status, statusText: String(status), headers: {}, data };
}

describe('AxiosHttpClient', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'http-client-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('request', () => {
    it('returns non-2xx responses instead of throwing', async () => {
      const { client } = clientWith(async () => response(401, Buffer.from('{"error":"expired"}')));

      const result = await client.request('GET', 'https://api.test/devices', {});

      expect(result.status).toBe(401);
      expect(parseJson(result.body)).toEqual({ error: 'expired' });
    });

    it('sends object bodies as JSON', async () => {
      const { client, adapter } = clientWith(async () => response(200, Buffer.from('{}')));

      await client.request('POST', 'https://api.test/devices/cam/commands', { 'Authorization': 'Bearer tok' }, { a: 1 });

      const config = adapter.mock.calls[0][0];
      expect(config.data).toBe('{"a":1}');
      expect(config.headers.get('Content-Type')).toBe('application/json');
      expect(config.headers.get('Authorization')).toBe('Bearer tok');
    });

    it('sends string bodies unchanged', async () => {
      const { client, adapter } = clientWith(async () => response(200, Buffer.from('{}')));

      await client.request(
        'POST',
        'https://auth.test/oauth/token',
        { 'Content-Type': 'application/x-www-form-urlencoded' },
        'grant_type=refresh_token'
      );

      expect(adapter.mock.calls[0][0].data).toBe('grant_type=refresh_token');
    });

    it('wraps connection failures in TransportError', async () => {
      const { client } = clientWith(async () => {
        throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED');
      });

      await expect(client.request('GET', 'https://api.test/devices', {}))
        .rejects.toThrow(new TransportError('Request to https://api.test/devices failed: connect ECONNREFUSED (ECONNREFUSED)'));
    });
  });

  describe('download', () => {
    it('writes the body to the destination', async () => {
      const { client } = clientWith(async () => response(200, Readable.from([Buffer.from('jpeg-bytes')])));
      const destination = path.join(dir, 'images', 'shot.jpg');

      await client.download('https://images.test/shot.jpg', {}, destination);

      expect(await fs.readFile(destination, 'utf-8')).toBe('jpeg-bytes');
      expect(await fs.readdir(path.dirname(destination))).toEqual(['shot.jpg']);
    });

    it('leaves no file behind on a non-2xx status', async () => {
      const { client } = clientWith(async () => response(401, Readable.from([Buffer.from('denied')])));
      const destination = path.join(dir, 'shot.jpg');

      const error = await client.download('https://images.test/shot.jpg', {}, destination).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error instanceof TransportError ? error.status : undefined).toBe(401);
      expect(await fs.readdir(dir)).toEqual([]);
    });

    it('removes the partial file when the stream fails', async () => {
      const broken = new Readable({
        read() {
          this.push('partial');
          this.destroy(new Error('socket hang up'));
        },
      });
      const { client } = clientWith(async () => response(200, broken));
      const destination = path.join(dir, 'shot.jpg');

      await expect(client.download('https://images.test/shot.jpg', {}, destination))
        .rejects.toThrow('socket hang up');
      expect(await fs.readdir(dir)).toEqual([]);
    });
  });

  it('treats only 2xx as success', () => {
    expect([199, 200, 204, 299, 300, 401].map(isSuccess)).toEqual([false, true, true, true, false, false]);
  });
});
