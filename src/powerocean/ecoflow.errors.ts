/**
 * The EcoFlow API answered, but not with a usable success envelope.
 */
export class EcoflowApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = 'EcoflowApiError';
  }
}

/**
 * The EcoFlow API could not be reached at all.
 */
export class EcoflowConnectionError extends Error {
  constructor(
    public readonly url: string,
    public readonly originalError?: Error,
  ) {
    super(`Unable to connect to ${url}. Device might be offline.`);
    this.name = 'EcoflowConnectionError';
  }
}

/**
 * Login succeeded at HTTP level but returned no token or user.
 */
export class AuthenticationFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationFailedError';
  }
}
