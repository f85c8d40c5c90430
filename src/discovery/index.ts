export { discover } from './session.js'
export type { DiscoveryOptions } from './session.js'

export { QueryTransmitter, SEND_INTERVAL_MS } from './transmitter.js'
export type { TransmitterOptions } from './transmitter.js'

export { ResponseCollector } from './collector.js'
export type { CollectorOptions } from './collector.js'

export { DiscoverySocket, MAX_TIMER_DELAY_MS } from './socket.js'
export type { RawDatagram, OpenSocketOptions } from './socket.js'

export {
  DescriptorClient,
  DESCRIPTOR_FETCH_TIMEOUT_MS,
  DESCRIPTOR_UNAVAILABLE,
} from './descriptor.js'

export {
  buildSearchRequest,
  decodePayload,
  parseHeaders,
  SSDP_MULTICAST_ADDR,
  SSDP_PORT,
} from './message.js'

export { assertDiscoveryRequest, createDiscoveryRequest } from './request.js'

export {
  DiscoveryError,
  InvalidRequestError,
  TransmitError,
  ReceiveTimeoutError,
  SocketError,
  DescriptorFetchError,
} from './errors.js'
export type { DiscoveryErrorCode } from './errors.js'

// TypeBox schemas
export {
  DiscoveryRequestSchema,
  DiscoveryRecordSchema,
  ParsedHeadersSchema,
} from './schemas.js'
export type { DiscoveryRequest, DiscoveryRecord, ParsedHeaders } from './schemas.js'
