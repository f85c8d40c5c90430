export { resolveDiscoveryRequest } from './loader.js'
export type { RequestOverrides } from './loader.js'
export { DEFAULT_REQUEST, ENV_PREFIX } from './defaults.js'
