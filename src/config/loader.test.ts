import { describe, it, expect } from 'vitest'
import { resolveDiscoveryRequest } from './loader.js'
import { InvalidRequestError } from '../discovery/errors.js'

function invalidPaths(fn: () => unknown): string[] {
  try {
    fn()
  } catch (err) {
    if (err instanceof InvalidRequestError) return err.fields.map((f) => f.path)
    throw err
  }
  throw new Error('expected InvalidRequestError')
}

describe('resolveDiscoveryRequest', () => {
  describe('successful resolution', () => {
    it('should apply defaults when nothing is given', () => {
      const request = resolveDiscoveryRequest({}, {})
      expect(request).toEqual({
        searchTarget: 'upnp:rootdevice',
        maxWaitSeconds: 2,
        retries: 3,
        socketTimeoutSeconds: 5,
      })
      expect(request.mx).toBeUndefined()
    })

    it('should coerce numeric strings from the command line', () => {
      const request = resolveDiscoveryRequest(
        { maxWaitSeconds: '5', socketTimeoutSeconds: '2.5', retries: '4', mx: '1' },
        {},
      )
      expect(request.maxWaitSeconds).toBe(5)
      expect(request.socketTimeoutSeconds).toBe(2.5)
      expect(request.retries).toBe(4)
      expect(request.mx).toBe(1)
    })

    it('should leave a numeric-looking search target as a string', () => {
      const request = resolveDiscoveryRequest({ searchTarget: '123' }, {})
      expect(request.searchTarget).toBe('123')
    })

    it('should return a frozen request', () => {
      const request = resolveDiscoveryRequest({}, {})
      expect(Object.isFrozen(request)).toBe(true)
    })
  })

  describe('environment variable overrides', () => {
    it('should apply SSDP_SCOUT_ prefixed variables', () => {
      const request = resolveDiscoveryRequest({}, {
        SSDP_SCOUT_MAX_WAIT_SECONDS: '7',
        SSDP_SCOUT_SEARCH_TARGET: 'ssdp:all',
        SSDP_SCOUT_SOCKET_TIMEOUT_SECONDS: '0.5',
      })
      expect(request.maxWaitSeconds).toBe(7)
      expect(request.searchTarget).toBe('ssdp:all')
      expect(request.socketTimeoutSeconds).toBe(0.5)
    })

    it('should let explicit overrides win over the environment', () => {
      const request = resolveDiscoveryRequest(
        { retries: '1' },
        { SSDP_SCOUT_RETRIES: '9' },
      )
      expect(request.retries).toBe(1)
    })

    it('should ignore unknown and unprefixed variables', () => {
      const request = resolveDiscoveryRequest({}, {
        SSDP_SCOUT_COLOR: 'red',
        MAX_WAIT_SECONDS: '9',
      })
      expect(Object.keys(request).sort()).toEqual([
        'maxWaitSeconds',
        'retries',
        'searchTarget',
        'socketTimeoutSeconds',
      ])
      expect(request.maxWaitSeconds).toBe(2)
    })
  })

  describe('validation errors', () => {
    it('should reject a zero max wait', () => {
      expect(invalidPaths(() => resolveDiscoveryRequest({ maxWaitSeconds: '0' }, {}))).toContain(
        '/maxWaitSeconds',
      )
    })

    it('should reject a zero socket timeout', () => {
      expect(
        invalidPaths(() => resolveDiscoveryRequest({ socketTimeoutSeconds: '0' }, {})),
      ).toContain('/socketTimeoutSeconds')
    })

    it('should reject negative retries', () => {
      expect(invalidPaths(() => resolveDiscoveryRequest({ retries: '-1' }, {}))).toContain(
        '/retries',
      )
    })

    it('should reject fractional retries', () => {
      expect(invalidPaths(() => resolveDiscoveryRequest({ retries: '2.5' }, {}))).toContain(
        '/retries',
      )
    })

    it('should reject an empty search target', () => {
      expect(invalidPaths(() => resolveDiscoveryRequest({ searchTarget: '' }, {}))).toContain(
        '/searchTarget',
      )
    })

    it('should list every failing field in the message', () => {
      expect(() =>
        resolveDiscoveryRequest({ maxWaitSeconds: '0', retries: '0' }, {}),
      ).toThrow(/Discovery request invalid:\n {2}- \/maxWaitSeconds: .+\n {2}- \/retries: /)
    })
  })
})
