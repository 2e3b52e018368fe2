export type ChannelErrorCode =
  | 'invalid_format'
  | 'invalid_version'
  | 'cert_mismatch'
  | 'not_implemented'

export class ChannelError extends Error {
  code: ChannelErrorCode;
  constructor (code: ChannelErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChannelError';
    this.code = code;
  }
}

export type TransportErrorReason = 'closed' | 'timeout' | 'io'

// raised by a Transport; the channel passes these through untouched
export class TransportError extends Error {
  reason: TransportErrorReason;
  constructor (reason: TransportErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.reason = reason;
  }
}

export const isChannelError = (err: unknown, code?: ChannelErrorCode): err is ChannelError => {
  return err instanceof ChannelError && (code === undefined || err.code === code)
}
