export interface OpenSkyErrorOptions {
  statusCode?: number | null;
  rateLimited?: boolean;
  retryAfter?: number | null;
}

export class OpenSkyError extends Error {
  public readonly statusCode: number | null;

  public readonly rateLimited: boolean;

  public readonly retryAfter: number | null;

  constructor(message: string, options: OpenSkyErrorOptions = {}) {
    super(message);
    this.name = 'OpenSkyError';
    this.statusCode = options.statusCode ?? null;
    this.rateLimited = options.rateLimited ?? false;
    this.retryAfter = options.retryAfter ?? null;
    Object.setPrototypeOf(this, OpenSkyError.prototype);
  }
}
