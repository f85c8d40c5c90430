/**
 * ResponseCollector: drains SSDP replies for a bounded window.
 *
 * Receives one datagram at a time until the wall-clock deadline passes or a
 * receive times out, turns every reply carrying a LOCATION header into a
 * DiscoveryRecord and, when asked, fetches each descriptor in turn. Never
 * rejects: receive-side failures end the loop and keep what was collected,
 * descriptor failures downgrade to DESCRIPTOR_UNAVAILABLE. The socket is
 * closed on every exit path.
 */

import { DescriptorClient, DESCRIPTOR_UNAVAILABLE } from './descriptor.js'
import { ReceiveTimeoutError } from './errors.js'
import { decodePayload, parseHeaders } from './message.js'
import type { DiscoverySocket, RawDatagram } from './socket.js'
import type { DiscoveryRecord } from './schemas.js'
import { silentLogger, type Logger } from '../logging/logger.js'

export interface CollectorOptions {
  logger?: Logger
  descriptorClient?: DescriptorClient
  /**
   * End the loop on the first receive timeout (default: true). When false,
   * receiving continues until the deadline, each wait capped by the time left.
   */
  stopOnFirstTimeout?: boolean
  /** Millisecond clock (default: Date.now) */
  clock?: () => number
}

export class ResponseCollector {
  private readonly logger: Logger
  private readonly descriptorClient: DescriptorClient
  private readonly stopOnFirstTimeout: boolean
  private readonly clock: () => number

  constructor(options: CollectorOptions = {}) {
    this.logger = options.logger ?? silentLogger
    this.descriptorClient = options.descriptorClient ?? new DescriptorClient()
    this.stopOnFirstTimeout = options.stopOnFirstTimeout ?? true
    this.clock = options.clock ?? Date.now
  }

  /**
   * Collect discovery records in receipt order.
   *
   * Takes ownership of `socket` and closes it before resolving.
   */
  async collect(
    socket: DiscoverySocket,
    maxWaitSeconds: number,
    followUpLocations: boolean,
  ): Promise<DiscoveryRecord[]> {
    const records: DiscoveryRecord[] = []
    const deadline = this.clock() + maxWaitSeconds * 1000

    try {
      while (this.clock() < deadline) {
        const timeoutMs = this.stopOnFirstTimeout
          ? socket.timeoutMs
          : Math.min(socket.timeoutMs, deadline - this.clock())

        let datagram: RawDatagram
        try {
          datagram = await socket.receive(timeoutMs)
        } catch (err) {
          if (err instanceof ReceiveTimeoutError) {
            if (this.stopOnFirstTimeout) {
              this.logger.debug('Socket timeout, stopping to listen for responses')
              break
            }
            continue
          }
          this.logger.error('Socket error while receiving SSDP response', { error: err })
          break
        }

        const record = await this.toRecord(datagram, followUpLocations)
        if (record) records.push(record)
      }
    } catch (err) {
      this.logger.error('Unexpected error while receiving SSDP responses', { error: err })
    } finally {
      await socket.close()
    }

    return records
  }

  private async toRecord(
    datagram: RawDatagram,
    followUpLocations: boolean,
  ): Promise<DiscoveryRecord | null> {
    const headers = parseHeaders(decodePayload(datagram.payload))
    const location = headers['LOCATION']
    if (location === undefined) {
      this.logger.debug('Ignoring reply without LOCATION', {
        from: `${datagram.sourceAddress}:${datagram.sourcePort}`,
      })
      return null
    }

    const record: DiscoveryRecord = {
      ipAddress: datagram.sourceAddress,
      port: datagram.sourcePort,
      headers: Object.freeze(headers),
      location,
    }
    if (followUpLocations) {
      record.descriptor = await this.fetchDescriptor(location)
    }

    this.logger.info(
      `Found device at ${datagram.sourceAddress}:${datagram.sourcePort}`,
      { location },
    )
    return Object.freeze(record)
  }

  private async fetchDescriptor(location: string): Promise<string> {
    try {
      const body = await this.descriptorClient.fetch(location)
      this.logger.debug(`Device description from ${location}`, { body })
      return body
    } catch (err) {
      this.logger.warn(`Failed to retrieve device description from ${location}`, {
        error: err,
      })
      return DESCRIPTOR_UNAVAILABLE
    }
  }
}
