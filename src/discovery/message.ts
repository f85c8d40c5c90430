/**
 * SSDP message framing.
 *
 * Builds the M-SEARCH request datagram and parses the loosely structured
 * HTTP-style header blocks that responders send back. No status line is
 * enforced on replies: any line containing a colon is a header.
 */

import type { DiscoveryRequest, ParsedHeaders } from './schemas.js'

/** SSDP multicast group (IPv4) */
export const SSDP_MULTICAST_ADDR = '239.255.255.250'
/** SSDP port */
export const SSDP_PORT = 1900

const CRLF = '\r\n'

/**
 * Format the M-SEARCH request for a discovery request.
 * Lines are CRLF-terminated and the block ends with an empty line.
 */
export function buildSearchRequest(request: DiscoveryRequest): string {
  const mx = request.mx ?? request.maxWaitSeconds
  return [
    'M-SEARCH * HTTP/1.1',
    `HOST: ${SSDP_MULTICAST_ADDR}:${SSDP_PORT}`,
    'MAN: "ssdp:discover"',
    `MX: ${mx}`,
    `ST: ${request.searchTarget}`,
    '',
    '',
  ].join(CRLF)
}

/**
 * Decode a datagram payload as UTF-8. Invalid byte sequences become U+FFFD.
 */
export function decodePayload(payload: Uint8Array): string {
  return new TextDecoder('utf-8').decode(payload)
}

/**
 * Parse a header block.
 *
 * Each line is split on its first colon; the name is trimmed and upper-cased,
 * the value trimmed. Lines without a colon are skipped. When a header repeats,
 * the last value wins.
 */
export function parseHeaders(text: string): ParsedHeaders {
  const headers: ParsedHeaders = {}
  for (const line of text.split(/\r\n|\r|\n/)) {
    const colon = line.indexOf(':')
    if (colon === -1) continue
    const name = line.slice(0, colon).trim().toUpperCase()
    headers[name] = line.slice(colon + 1).trim()
  }
  return headers
}
