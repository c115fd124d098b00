// Error taxonomy shared by the providers, the orchestrator and the handlers.

export type ProviderErrorKind = 'ProviderUnavailable' | 'ProviderTimeout' | 'ProviderInvalidResponse';

export type ErrorKind =
  | 'Unauthenticated'
  | 'InvalidArgument'
  | ProviderErrorKind
  | 'Cancelled'
  | 'Internal';

/** Call-level failure with a kind the transport knows how to map. */
export class GatewayError extends Error {
  constructor(readonly kind: ErrorKind, message: string) {
    super(message);
    this.name = 'GatewayError';
  }
}

/** Raised by vendor adapters; isolated per item by the orchestrator. */
export class ProviderError extends Error {
  constructor(readonly kind: ProviderErrorKind, message: string) {
    super(message);
    this.name = 'ProviderError';
  }
}
