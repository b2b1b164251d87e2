export type ProbeErrorKind = 'timeout' | 'connection' | 'http-status' | 'rpc-error' | 'cancelled';

/**
 * Thrown from `init` when the provider list or settings cannot be used.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when the fastest provider is requested before any round
 * produced a successful measurement.
 */
export class NotReadyError extends Error {
  constructor(message = 'No provider has been measured yet') {
    super(message);
    this.name = 'NotReadyError';
  }
}

// Raised by transports; the prober turns it into a failed outcome.
export class ProbeError extends Error {
  constructor(public readonly kind: ProbeErrorKind, message: string) {
    super(message);
    this.name = 'ProbeError';
  }
}
