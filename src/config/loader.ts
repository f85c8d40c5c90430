import { createDiscoveryRequest } from '../discovery/request.js'
import type { DiscoveryRequest } from '../discovery/schemas.js'
import { DEFAULT_REQUEST, ENV_PREFIX } from './defaults.js'

/**
 * Raw request values as they arrive from the command line. Strings are
 * accepted for numeric fields and coerced before validation.
 */
export type RequestOverrides = {
  [K in keyof DiscoveryRequest]?: DiscoveryRequest[K] | string
}

const REQUEST_KEYS: ReadonlyArray<keyof DiscoveryRequest> = [
  'searchTarget',
  'mx',
  'maxWaitSeconds',
  'retries',
  'socketTimeoutSeconds',
]

const NUMERIC_KEYS: ReadonlySet<string> = new Set([
  'mx',
  'maxWaitSeconds',
  'retries',
  'socketTimeoutSeconds',
])

/**
 * Coerce numeric strings to numbers. Anything else is passed through so
 * that schema validation reports it against the field.
 */
function coerceNumeric(value: string): string | number {
  if (/^\d+$/.test(value)) return parseInt(value, 10)
  if (/^\d*\.\d+$/.test(value)) return parseFloat(value)
  return value
}

/** SEARCH_TARGET -> searchTarget */
function envKeyToField(key: string): string {
  return key
    .toLowerCase()
    .replace(/_([a-z])/g, (_, c: string) => c.toUpperCase())
}

function isRequestKey(key: string): key is keyof DiscoveryRequest {
  return (REQUEST_KEYS as ReadonlyArray<string>).includes(key)
}

function applyOverride(
  target: Record<string, unknown>,
  key: string,
  value: unknown,
): void {
  if (value === undefined) return
  target[key] = typeof value === 'string' && NUMERIC_KEYS.has(key) ? coerceNumeric(value) : value
}

/**
 * Read SSDP_SCOUT_ prefixed environment variables:
 *   SSDP_SCOUT_MAX_WAIT_SECONDS=5 -> maxWaitSeconds = 5
 * Unknown names are ignored.
 */
function applyEnvOverrides(
  target: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): void {
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue
    const field = envKeyToField(key.slice(ENV_PREFIX.length))
    if (isRequestKey(field)) applyOverride(target, field, value)
  }
}

/**
 * Resolve, validate, and freeze a DiscoveryRequest.
 *
 * Pipeline: defaults -> SSDP_SCOUT_* env overrides -> explicit overrides
 *           -> coerce numeric strings -> validate against TypeBox schema
 *
 * @throws InvalidRequestError with field-level details on validation failure
 */
export function resolveDiscoveryRequest(
  overrides: RequestOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): Readonly<DiscoveryRequest> {
  const merged: Record<string, unknown> = { ...DEFAULT_REQUEST }
  applyEnvOverrides(merged, env)
  for (const key of REQUEST_KEYS) {
    applyOverride(merged, key, overrides[key])
  }
  return createDiscoveryRequest(merged)
}
