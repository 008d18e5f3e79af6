/**
 * Error raised when a connection is closed, reset or refuses a write.
 * Fatal to the affected connection only.
 */
export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(`Transport error: ${message}`, options);
    this.name = 'TransportError';
  }
}

/**
 * Error raised when a complete frame is not valid JSON.
 */
export class FrameDecodeError extends Error {
  constructor(
    readonly frame: string,
    options?: ErrorOptions
  ) {
    super(`Malformed frame: ${frame.length > 80 ? `${frame.slice(0, 80)}...` : frame}`, options);
    this.name = 'FrameDecodeError';
  }
}
