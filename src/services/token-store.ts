import { randomBytes } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { CredentialRecord } from '../types/auth.js';
import { StoreIOError } from '../types/errors.js';

const FIELD_KEYS = {
  clientId: 'client_id',
  clientSecret: 'client_secret',
  accessToken: 'access_token',
  refreshToken: 'refresh_token',
} as const;

const EXPIRES_KEY = 'expires_in';

/**
 * Reads a credential record from a key=value file.
 * Returns null when the file does not exist.
 */
export async function loadCredentials(filePath: string): Promise<CredentialRecord | null> {
  let data: string;
  try {
    data = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw new StoreIOError(`Failed to read token file ${filePath}: ${describe(error)}`, filePath);
  }
  return parseCredentials(data);
}

export function parseCredentials(data: string): CredentialRecord {
  const values = new Map<string, string>();
  for (const rawLine of data.split('\n')) {
    const line = rawLine.replace(/\r$/, '');
    const separator = line.indexOf('=');
    if (separator === -1) {
      continue;
    }
    values.set(line.slice(0, separator).trim(), line.slice(separator + 1));
  }

  const record: CredentialRecord = {
    clientId: values.get(FIELD_KEYS.clientId) ?? '',
    clientSecret: values.get(FIELD_KEYS.clientSecret) ?? '',
    accessToken: values.get(FIELD_KEYS.accessToken) ?? '',
    refreshToken: values.get(FIELD_KEYS.refreshToken) ?? '',
  };
  const expires = values.get(EXPIRES_KEY);
  if (expires) {
    record.expiresHint = expires;
  }
  return record;
}

export function serializeCredentials(record: CredentialRecord): string {
  const lines = [
    `${FIELD_KEYS.clientId}=${record.clientId}`,
    `${FIELD_KEYS.clientSecret}=${record.clientSecret}`,
    `${FIELD_KEYS.accessToken}=${record.accessToken}`,
    `${FIELD_KEYS.refreshToken}=${record.refreshToken}`,
  ];
  if (record.expiresHint) {
    lines.push(`${EXPIRES_KEY}=${record.expiresHint}`);
  }
  return lines.join('\n') + '\n';
}

/**
 * Writes the record through a temp file and rename, so a failed write
 * leaves the previous file in place.
 */
export async function saveCredentials(filePath: string, record: CredentialRecord): Promise<void> {
  assertStorable(record, filePath);

  const tempPath = `${filePath}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
  } catch (error) {
    throw new StoreIOError(`Failed to create directory for ${filePath}: ${describe(error)}`, filePath);
  }

  try {
    await fs.writeFile(tempPath, serializeCredentials(record), { encoding: 'utf-8', mode: 0o600 });
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new StoreIOError(`Failed to write token file ${filePath}: ${describe(error)}`, filePath);
  }
}

function assertStorable(record: CredentialRecord, filePath: string): void {
  const values: Array<[string, string | undefined]> = [
    [FIELD_KEYS.clientId, record.clientId],
    [FIELD_KEYS.clientSecret, record.clientSecret],
    [FIELD_KEYS.accessToken, record.accessToken],
    [FIELD_KEYS.refreshToken, record.refreshToken],
    [EXPIRES_KEY, record.expiresHint],
  ];
  for (const [key, value] of values) {
    if (value !== undefined && /[\r\n]/.test(value)) {
      throw new StoreIOError(`Refusing to save ${key}: value contains a line break`, filePath);
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface TokenStore {
  load(filePath: string): Promise<CredentialRecord | null>;
  save(filePath: string, record: CredentialRecord): Promise<void>;
}

export const fileTokenStore: TokenStore = {
  load: loadCredentials,
  save: saveCredentials,
};
