/**
 * `ssdp-scout discover` CLI command -- find UPnP devices on the local network via SSDP.
 *
 * One-shot: multicast an M-SEARCH, collect replies for --max-wait seconds,
 * print what was found. Exit code 1 on invalid options or a failed send.
 */

import type { Command } from 'commander'
import {
  discover,
  InvalidRequestError,
  TransmitError,
  DESCRIPTOR_UNAVAILABLE,
  type DiscoveryRecord,
  type DiscoveryRequest,
} from '../../discovery/index.js'
import { resolveDiscoveryRequest } from '../../config/index.js'
import { createCliLogger } from '../logger.js'
import { output } from '../output.js'

interface DiscoverOptions {
  searchTarget?: string
  mx?: string
  maxWait?: string
  timeout?: string
  retries?: string
  follow: boolean
  keepListening?: boolean
  json?: boolean
  verbose?: boolean
}

function descriptorState(record: DiscoveryRecord): string {
  if (record.descriptor === undefined) return 'skipped'
  return record.descriptor === DESCRIPTOR_UNAVAILABLE ? 'unavailable' : 'fetched'
}

function printRecords(records: DiscoveryRecord[]): void {
  if (records.length === 0) {
    output.info('No SSDP devices found')
    return
  }
  output.info(`Found ${records.length} SSDP device(s)`)
  output.info('')
  output.table(
    records.map((r) => ({
      IP: r.ipAddress,
      Port: String(r.port),
      Server: r.headers['SERVER'] ?? '',
      Location: r.location,
      Descriptor: descriptorState(r),
    })),
  )
}

export function registerDiscoverCommand(program: Command): void {
  program
    .command('discover', { isDefault: true })
    .description('Search the local network for SSDP devices')
    .option('-s, --search-target <st>', 'search target (ST), default upnp:rootdevice')
    .option('-m, --mx <seconds>', 'MX value sent to responders, default max wait')
    .option('-w, --max-wait <seconds>', 'how long to collect replies, default 2')
    .option('-t, --timeout <seconds>', 'per-receive socket timeout, default 5.0')
    .option('-r, --retries <count>', 'number of times the search is sent, default 3')
    .option('--no-follow', 'do not fetch device descriptors')
    .option('--keep-listening', 'keep receiving after a socket timeout until max wait elapses')
    .option('--json', 'print discovered devices as JSON')
    .option('-v, --verbose', 'enable verbose output')
    .action(async (options: DiscoverOptions) => {
      let request: Readonly<DiscoveryRequest>
      try {
        request = resolveDiscoveryRequest({
          searchTarget: options.searchTarget,
          mx: options.mx,
          maxWaitSeconds: options.maxWait,
          socketTimeoutSeconds: options.timeout,
          retries: options.retries,
        })
      } catch (err) {
        if (err instanceof InvalidRequestError) {
          output.error(err.message)
          process.exit(1)
          return
        }
        throw err
      }

      const logger = createCliLogger({ verbose: options.verbose })
      logger.debug('Starting SSDP discovery', { ...request })

      let records: DiscoveryRecord[]
      try {
        records = await discover(request, {
          logger,
          followUpLocations: options.follow,
          stopOnFirstTimeout: !options.keepListening,
        })
      } catch (err) {
        if (err instanceof TransmitError) {
          output.error(err.message)
          process.exit(1)
          return
        }
        throw err
      }

      if (options.json) {
        output.json(records)
      } else {
        printRecords(records)
      }
    })
}
