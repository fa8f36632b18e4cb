/**
 * Error types surfaced to the owning process
 */

/**
 * Raised when the service cannot start: invalid configuration or a socket
 * that cannot be bound. Always fatal.
 */
export class StartupError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StartupError';
  }
}
