import { Value } from '@sinclair/typebox/value'
import { DiscoveryRequestSchema, type DiscoveryRequest } from './schemas.js'
import { InvalidRequestError } from './errors.js'

/**
 * Throw InvalidRequestError with field-level details unless `value` is a
 * well-formed DiscoveryRequest.
 */
export function assertDiscoveryRequest(value: unknown): asserts value is DiscoveryRequest {
  if (Value.Check(DiscoveryRequestSchema, value)) return

  const fields = [...Value.Errors(DiscoveryRequestSchema, value)].map((e) => ({
    path: e.path,
    message: e.message,
  }))
  const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
  throw new InvalidRequestError(`Discovery request invalid:\n${fieldMessages}`, fields)
}

/**
 * Validate and freeze a DiscoveryRequest.
 *
 * @throws InvalidRequestError when a field is missing or not positive
 */
export function createDiscoveryRequest(input: unknown): Readonly<DiscoveryRequest> {
  assertDiscoveryRequest(input)
  const request: DiscoveryRequest = {
    searchTarget: input.searchTarget,
    maxWaitSeconds: input.maxWaitSeconds,
    retries: input.retries,
    socketTimeoutSeconds: input.socketTimeoutSeconds,
  }
  if (input.mx !== undefined) request.mx = input.mx
  return Object.freeze(request)
}
