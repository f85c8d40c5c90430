import { QueryTransmitter } from './transmitter.js'
import { ResponseCollector } from './collector.js'
import type { DescriptorClient } from './descriptor.js'
import type { DiscoveryRecord, DiscoveryRequest } from './schemas.js'
import { silentLogger, type Logger } from '../logging/logger.js'

export interface DiscoveryOptions {
  logger?: Logger
  /** Fetch the descriptor at each LOCATION (default: true) */
  followUpLocations?: boolean
  /** End collection on the first receive timeout (default: true) */
  stopOnFirstTimeout?: boolean
  descriptorClient?: DescriptorClient
  /** Destination overrides for testing */
  multicastAddress?: string
  multicastPort?: number
  multicastTtl?: number
  sendIntervalMs?: number
  clock?: () => number
}

/**
 * Run one discovery session: send the search, then collect replies.
 *
 * Only failures to send reject; everything on the receive side is folded
 * into the returned records.
 */
export async function discover(
  request: DiscoveryRequest,
  options: DiscoveryOptions = {},
): Promise<DiscoveryRecord[]> {
  const logger = options.logger ?? silentLogger

  const transmitter = new QueryTransmitter({
    logger,
    multicastAddr: options.multicastAddress,
    port: options.multicastPort,
    multicastTtl: options.multicastTtl,
    sendIntervalMs: options.sendIntervalMs,
  })
  const socket = await transmitter.send(request)

  const collector = new ResponseCollector({
    logger,
    descriptorClient: options.descriptorClient,
    stopOnFirstTimeout: options.stopOnFirstTimeout,
    clock: options.clock,
  })
  return collector.collect(socket, request.maxWaitSeconds, options.followUpLocations ?? true)
}
