/**
 * Base class of failures to reach a remote endpoint or get a successful
 * status back from it. The reconciliation run maps these to
 * `ExitCode.networkError`.
 */
export class TransportError extends Error {
  override readonly name: string = 'TransportError';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export class HTTPStatusError extends TransportError {
  override readonly name = 'HTTPStatusError';

  constructor(
    readonly status: number,
    readonly url: string,
    readonly body: string,
  ) {
    super(`HTTP ${status} from ${url}: ${body}`);
  }
}

export class TimeoutError extends TransportError {
  override readonly name = 'TimeoutError';

  constructor(
    readonly url: string,
    readonly timeout: number,
  ) {
    super(`request to ${url} timed out after ${timeout}ms`);
  }
}

/**
 * The remote endpoint answered, but not with what was expected: wrong
 * content type, unparsable body, or a body of the wrong shape.
 */
export class ResponseFormatError extends Error {
  override readonly name = 'ResponseFormatError';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}
