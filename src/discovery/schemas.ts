/**
 * TypeBox schemas for SSDP search requests and discovery results.
 */

import { Type, type Static } from '@sinclair/typebox'

/** Parsed SSDP header block: upper-cased header name -> trimmed value */
export const ParsedHeadersSchema = Type.Record(Type.String(), Type.String())
export type ParsedHeaders = Static<typeof ParsedHeadersSchema>

/** Parameters of one discovery session */
export const DiscoveryRequestSchema = Type.Object({
  /** ST header value (e.g., 'upnp:rootdevice', 'ssdp:all') */
  searchTarget: Type.String({ minLength: 1 }),
  /** MX header value in seconds; falls back to maxWaitSeconds */
  mx: Type.Optional(Type.Integer({ minimum: 1 })),
  /** Length of the collection window in seconds */
  maxWaitSeconds: Type.Integer({ minimum: 1 }),
  /** Number of times the search datagram is sent */
  retries: Type.Integer({ minimum: 1 }),
  /** Per-receive timeout in seconds */
  socketTimeoutSeconds: Type.Number({ exclusiveMinimum: 0 }),
})
export type DiscoveryRequest = Static<typeof DiscoveryRequestSchema>

/** A responder that replied with a LOCATION header */
export const DiscoveryRecordSchema = Type.Object({
  /** Source address of the reply datagram */
  ipAddress: Type.String(),
  /** Source port of the reply datagram */
  port: Type.Integer({ minimum: 0, maximum: 65535 }),
  headers: ParsedHeadersSchema,
  /** Value of the LOCATION header */
  location: Type.String(),
  /** Descriptor body, or DESCRIPTOR_UNAVAILABLE; absent when follow-up is disabled */
  descriptor: Type.Optional(Type.String()),
})
export type DiscoveryRecord = Static<typeof DiscoveryRecordSchema>
