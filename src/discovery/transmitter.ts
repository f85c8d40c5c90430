/**
 * QueryTransmitter: sends the SSDP M-SEARCH query.
 *
 * Opens the socket the replies will arrive on, multicasts the search
 * datagram `retries` times and hands the still-open socket to the caller.
 */

import { setTimeout as sleep } from 'node:timers/promises'
import { buildSearchRequest, SSDP_MULTICAST_ADDR, SSDP_PORT } from './message.js'
import { assertDiscoveryRequest } from './request.js'
import { DiscoverySocket } from './socket.js'
import { TransmitError } from './errors.js'
import type { DiscoveryRequest } from './schemas.js'
import { silentLogger, type Logger } from '../logging/logger.js'

/** Pause after each send of the search datagram */
export const SEND_INTERVAL_MS = 100

export interface TransmitterOptions {
  logger?: Logger
  /** Destination address override for testing (default: 239.255.255.250) */
  multicastAddr?: string
  /** Destination port override for testing (default: 1900) */
  port?: number
  /** Multicast TTL (default: 2) */
  multicastTtl?: number
  sendIntervalMs?: number
}

export class QueryTransmitter {
  private readonly logger: Logger
  private readonly multicastAddr: string
  private readonly port: number
  private readonly multicastTtl?: number
  private readonly sendIntervalMs: number

  constructor(options: TransmitterOptions = {}) {
    this.logger = options.logger ?? silentLogger
    this.multicastAddr = options.multicastAddr ?? SSDP_MULTICAST_ADDR
    this.port = options.port ?? SSDP_PORT
    this.multicastTtl = options.multicastTtl
    this.sendIntervalMs = options.sendIntervalMs ?? SEND_INTERVAL_MS
  }

  /**
   * Send the search request and return the open socket.
   *
   * @throws InvalidRequestError if the request fails validation
   * @throws TransmitError if the socket cannot be opened or a send fails;
   *         the socket is closed before the error is thrown
   */
  async send(request: DiscoveryRequest): Promise<DiscoverySocket> {
    assertDiscoveryRequest(request)

    let socket: DiscoverySocket
    try {
      socket = await DiscoverySocket.open({
        timeoutMs: request.socketTimeoutSeconds * 1000,
        multicastTtl: this.multicastTtl,
      })
    } catch (err) {
      this.logger.error('Socket error while opening discovery socket', { error: err })
      throw new TransmitError(`Failed to open discovery socket: ${describe(err)}`, { cause: err })
    }

    const payload = Buffer.from(buildSearchRequest(request), 'utf-8')
    try {
      for (let attempt = 1; attempt <= request.retries; attempt++) {
        await socket.send(payload, this.port, this.multicastAddr)
        this.logger.debug(`SSDP discovery message sent (attempt ${attempt}/${request.retries})`, {
          st: request.searchTarget,
        })
        await sleep(this.sendIntervalMs)
      }
    } catch (err) {
      await socket.close()
      this.logger.error('Socket error while sending SSDP discovery', { error: err })
      throw new TransmitError(`Failed to send SSDP discovery message: ${describe(err)}`, {
        cause: err,
      })
    }

    return socket
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
