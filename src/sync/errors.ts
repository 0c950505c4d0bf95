/**
 * Errors raised while reconciling with a remote store.
 */

/**
 * A remote value has no usable modification time.
 */
export class TimeError extends Error {
  constructor(
    /** Variable or blob the timestamp belongs to */
    readonly unit: string,
    message: string,
  ) {
    super(message);
    this.name = 'TimeError';
  }
}

/**
 * A store could not be read or written.
 */
export class TransportError extends Error {
  constructor(
    readonly unit: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * Wrap a store failure with the unit it was working on.
 * Errors that already carry that context pass through unchanged.
 */
export function asTransportError(unit: string, action: string, err: unknown): Error {
  if (err instanceof TransportError || err instanceof TimeError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError(unit, `Failed to ${action} ${unit}: ${message}`, { cause: err });
}
