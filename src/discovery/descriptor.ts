/**
 * Thin HTTP wrapper for fetching device descriptor documents.
 *
 * One GET per call with its own timeout. Throws DescriptorFetchError on
 * transport failures and on statuses outside 2xx/3xx. No retries.
 */

import { DescriptorFetchError } from './errors.js'

/** Timeout for a single descriptor GET */
export const DESCRIPTOR_FETCH_TIMEOUT_MS = 5000

/** Marker stored in DiscoveryRecord.descriptor when the fetch failed */
export const DESCRIPTOR_UNAVAILABLE = 'Unavailable'

export class DescriptorClient {
  constructor(private readonly timeoutMs: number = DESCRIPTOR_FETCH_TIMEOUT_MS) {}

  /**
   * GET the document at `location` and return its body as text.
   */
  async fetch(location: string): Promise<string> {
    let res: Response
    try {
      res = await fetch(location, { signal: AbortSignal.timeout(this.timeoutMs) })
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new DescriptorFetchError(`GET ${location} failed: ${reason}`, location, {
        cause: err,
      })
    }
    if (res.status < 200 || res.status >= 400) {
      throw new DescriptorFetchError(`GET ${location} failed: ${res.status}`, location, {
        statusCode: res.status,
      })
    }
    return await res.text()
  }
}
