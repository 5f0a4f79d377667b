import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  loadCredentials,
  parseCredentials,
  saveCredentials,
  serializeCredentials,
} from '../../src/services/token-store.js';
import { CredentialRecord } from '../../src/types/auth.js';
import { StoreIOError } from '../../src/types/errors.js';

describe('token store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'token-store-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns null when the file does not exist', async () => {
    expect(await loadCredentials(path.join(dir, 'missing.txt'))).toBeNull();
  });

  it('round-trips a record through save and load', async () => {
    const record: CredentialRecord = {
      clientId: 'test-client',
      clientSecret: 'test-secret',
      accessToken: 'access=with=equals',
      refreshToken: ' padded-refresh ',
    };
    const file = path.join(dir, 'nested', 'token.txt');

    await saveCredentials(file, record);

    expect(await loadCredentials(file)).toEqual(record);
  });

  it('writes newline-delimited key=value pairs', async () => {
    const file = path.join(dir, 'token.txt');
    await saveCredentials(file, {
      clientId: 'cid',
      clientSecret: 'csecret',
      accessToken: 'tok1',
      refreshToken: 'ref1',
    });

    expect(await fs.readFile(file, 'utf-8')).toBe(
      'client_id=cid\nclient_secret=csecret\naccess_token=tok1\nrefresh_token=ref1\n'
    );
  });

  it('keeps overlapping saves apart and leaves one complete record', async () => {
    const file = path.join(dir, 'token.txt');
    const first: CredentialRecord = { clientId: 'cid', clientSecret: 'csecret', accessToken: 'tok1', refreshToken: 'ref1' };
    const second: CredentialRecord = { clientId: 'cid', clientSecret: 'csecret', accessToken: 'tok2', refreshToken: 'ref2' };

    await Promise.all([saveCredentials(file, first), saveCredentials(file, second)]);

    expect([serializeCredentials(first), serializeCredentials(second)]).toContain(await fs.readFile(file, 'utf-8'));
    expect(await fs.readdir(dir)).toEqual(['token.txt']);
  });

  it('ignores unknown keys and defaults missing keys to empty strings', () => {
    const record = parseCredentials('device_id=abc\naccess_token=tok\r\nnot a pair\n');

    expect(record).toEqual({
      clientId: '',
      clientSecret: '',
      accessToken: 'tok',
      refreshToken: '',
    });
  });

  it('keeps expires_in as an advisory hint', () => {
    const record = parseCredentials('access_token=a\nrefresh_token=r\nexpires_in=86400\n');

    expect(record.expiresHint).toBe('86400');
    expect(serializeCredentials(record)).toContain('expires_in=86400\n');
  });

  it('rejects values with embedded line breaks and leaves the old file untouched', async () => {
    const file = path.join(dir, 'token.txt');
    await fs.writeFile(file, 'access_token=old\n');

    await expect(saveCredentials(file, {
      clientId: 'cid',
      clientSecret: 'secret',
      accessToken: 'bad\ntoken',
      refreshToken: 'ref',
    })).rejects.toBeInstanceOf(StoreIOError);

    expect(await fs.readFile(file, 'utf-8')).toBe('access_token=old\n');
  });

  it('reports write failures as StoreIOError', async () => {
    const blocker = path.join(dir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');

    await expect(saveCredentials(path.join(blocker, 'token.txt'), {
      clientId: '',
      clientSecret: '',
      accessToken: '',
      refreshToken: '',
    })).rejects.toBeInstanceOf(StoreIOError);
  });
});
