export type DiscoveryErrorCode =
  | 'INVALID_REQUEST'
  | 'TRANSMIT_FAILED'
  | 'RECEIVE_TIMEOUT'
  | 'SOCKET_ERROR'
  | 'DESCRIPTOR_UNAVAILABLE'

export class DiscoveryError extends Error {
  constructor(
    public readonly code: DiscoveryErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'DiscoveryError'
  }
}

/** A DiscoveryRequest failed schema validation. */
export class InvalidRequestError extends DiscoveryError {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super('INVALID_REQUEST', message)
    this.name = 'InvalidRequestError'
    this.fields = fields
  }
}

/** Opening the socket or sending the search datagram failed. Fatal to the session. */
export class TransmitError extends DiscoveryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSMIT_FAILED', message, options)
    this.name = 'TransmitError'
  }
}

/** No datagram arrived within the per-call receive timeout. */
export class ReceiveTimeoutError extends DiscoveryError {
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super('RECEIVE_TIMEOUT', `No datagram received within ${timeoutMs}ms`)
    this.name = 'ReceiveTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

export class SocketError extends DiscoveryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SOCKET_ERROR', message, options)
    this.name = 'SocketError'
  }
}

/** Descriptor GET failed at the transport level or returned a non-2xx/3xx status. */
export class DescriptorFetchError extends DiscoveryError {
  readonly location: string
  readonly statusCode?: number

  constructor(
    message: string,
    location: string,
    options?: { statusCode?: number; cause?: unknown },
  ) {
    super('DESCRIPTOR_UNAVAILABLE', message, { cause: options?.cause })
    this.name = 'DescriptorFetchError'
    this.location = location
    this.statusCode = options?.statusCode
  }
}
