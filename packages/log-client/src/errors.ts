export type LogClientErrorKind = 'INVALID_REQUEST' | 'TIMEOUT' | 'HTTP' | 'NETWORK' | 'INVALID_RESPONSE';

/**
 * Failure talking to the log server. Never used for proof verification
 * outcomes, which are returned as results by the merkle package.
 */
export class LogClientError extends Error {
  readonly kind: LogClientErrorKind;
  readonly httpStatus?: number;

  constructor(kind: LogClientErrorKind, message: string, httpStatus?: number) {
    super(message);
    this.name = 'LogClientError';
    this.kind = kind;
    if (httpStatus !== undefined) {
      this.httpStatus = httpStatus;
    }
  }
}
