import type { DiscoveryRequest } from '../discovery/schemas.js'

/** Default discovery request; `mx` is left to follow maxWaitSeconds */
export const DEFAULT_REQUEST: Readonly<DiscoveryRequest> = Object.freeze({
  searchTarget: 'upnp:rootdevice',
  maxWaitSeconds: 2,
  retries: 3,
  socketTimeoutSeconds: 5.0,
})

/** Prefix of environment variables that override DEFAULT_REQUEST */
export const ENV_PREFIX = 'SSDP_SCOUT_'
