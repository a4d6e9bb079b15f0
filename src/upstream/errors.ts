export type UpstreamErrorKind = 'UpstreamUnavailable' | 'UpstreamError';

export class UpstreamUnavailableError extends Error {
  readonly kind: UpstreamErrorKind = 'UpstreamUnavailable';
  readonly statusCode = 503;

  constructor(message = 'OpenAI client not available. Please configure OPENAI_API_KEY.') {
    super(message);
    this.name = 'UpstreamUnavailableError';
  }
}

/** A failed call to the provider, whatever the SDK reported */
export class UpstreamError extends Error {
  readonly kind: UpstreamErrorKind = 'UpstreamError';
  readonly statusCode = 500;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UpstreamError';
  }
}
