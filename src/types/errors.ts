export class TransportError extends Error {
  constructor(message: string, readonly url?: string, readonly status?: number) {
    super(message);
    this.name = 'TransportError';
  }
}

export class AuthExchangeFailedError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'AuthExchangeFailedError';
  }
}

export class RefreshFailedError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'RefreshFailedError';
  }
}

/**
 * Raised when an API call is still rejected with 401 after one refresh,
 * or when the refresh itself could not produce a token.
 */
export class AuthFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthFailedError';
  }
}

export class NotAuthenticatedError extends Error {
  constructor(message = 'No access token, refresh token or authorization code available. Run "authorize" first.') {
    super(message);
    this.name = 'NotAuthenticatedError';
  }
}

export class StoreIOError extends Error {
  constructor(message: string, readonly path: string) {
    super(message);
    this.name = 'StoreIOError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'An unknown error occurred';
}
