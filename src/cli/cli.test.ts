import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { Command } from 'commander'
import { registerDiscoverCommand } from './commands/discover.js'
import { discover, TransmitError, type DiscoveryRecord } from '../discovery/index.js'

vi.mock('../discovery/index.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../discovery/index.js')>()),
  discover: vi.fn(),
}))

const RECORD: DiscoveryRecord = {
  ipAddress: '10.0.0.5',
  port: 1900,
  headers: {
    LOCATION: 'http://10.0.0.5:80/desc.xml',
    SERVER: 'Linux/5 UPnP/1.0',
  },
  location: 'http://10.0.0.5:80/desc.xml',
  descriptor: '<root/>',
}

describe('CLI', () => {
  let stdout: string[]
  let stderr: string[]

  beforeEach(() => {
    stdout = []
    stderr = []
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk))
      return true
    })
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk))
      return true
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
    vi.clearAllMocks()
  })

  function createProgram(): Command {
    const program = new Command()
    program
      .name('ssdp-scout')
      .description('Discover UPnP devices on the local network via SSDP')
      .version('0.1.0')
      .exitOverride()
    registerDiscoverCommand(program)
    return program
  }

  describe('help output', () => {
    it('should list the discover command', () => {
      const help = createProgram().helpInformation()
      expect(help).toContain('discover')
    })
  })

  describe('discover command', () => {
    it('should print the device count and a table row per device', async () => {
      vi.mocked(discover).mockResolvedValue([RECORD])
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)

      await createProgram().parseAsync(['node', 'ssdp-scout', 'discover'])

      expect(exitSpy).not.toHaveBeenCalled()
      expect(stdout).toContain('Found 1 SSDP device(s)\n')
      expect(stdout).toContain(
        '10.0.0.5  1900  Linux/5 UPnP/1.0  http://10.0.0.5:80/desc.xml  fetched\n',
      )
    })

    it('should report when no devices are found and exit normally', async () => {
      vi.mocked(discover).mockResolvedValue([])
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)

      await createProgram().parseAsync(['node', 'ssdp-scout', 'discover'])

      expect(exitSpy).not.toHaveBeenCalled()
      expect(stdout).toEqual(['No SSDP devices found\n'])
    })

    it('should build the request from flags', async () => {
      vi.mocked(discover).mockResolvedValue([])
      vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)

      await createProgram().parseAsync([
        'node', 'ssdp-scout', 'discover',
        '--search-target', 'ssdp:all',
        '--max-wait', '4',
        '--timeout', '1.5',
        '--retries', '2',
        '--mx', '1',
        '--no-follow',
        '--keep-listening',
      ])

      expect(discover).toHaveBeenCalledOnce()
      const [request, options] = vi.mocked(discover).mock.calls[0] ?? []
      expect(request).toEqual({
        searchTarget: 'ssdp:all',
        mx: 1,
        maxWaitSeconds: 4,
        retries: 2,
        socketTimeoutSeconds: 1.5,
      })
      expect(options).toMatchObject({ followUpLocations: false, stopOnFirstTimeout: false })
    })

    it('should follow locations and stop on first timeout by default', async () => {
      vi.mocked(discover).mockResolvedValue([])
      vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)

      await createProgram().parseAsync(['node', 'ssdp-scout', 'discover'])

      const [, options] = vi.mocked(discover).mock.calls[0] ?? []
      expect(options).toMatchObject({ followUpLocations: true, stopOnFirstTimeout: true })
    })

    it('should run discover when no command is named', async () => {
      vi.mocked(discover).mockResolvedValue([])
      vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)

      await createProgram().parseAsync(['node', 'ssdp-scout', '--max-wait', '3'])

      const [request] = vi.mocked(discover).mock.calls[0] ?? []
      expect(request).toMatchObject({ maxWaitSeconds: 3 })
    })

    it('should print records as JSON with --json', async () => {
      vi.mocked(discover).mockResolvedValue([RECORD])
      vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)

      await createProgram().parseAsync(['node', 'ssdp-scout', 'discover', '--json'])

      expect(stdout).toEqual([JSON.stringify([RECORD], null, 2) + '\n'])
    })

    it('should exit 1 on a non-positive max wait without searching', async () => {
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)

      await createProgram().parseAsync(['node', 'ssdp-scout', 'discover', '--max-wait', '0'])

      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(discover).not.toHaveBeenCalled()
      expect(stderr[0]).toMatch(/^Error: Discovery request invalid:\n {2}- \/maxWaitSeconds: /)
    })

    it('should exit 1 when the search cannot be sent', async () => {
      vi.mocked(discover).mockRejectedValue(
        new TransmitError('Failed to send SSDP discovery message: ENETUNREACH'),
      )
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)

      await createProgram().parseAsync(['node', 'ssdp-scout', 'discover'])

      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(stderr).toContain('Error: Failed to send SSDP discovery message: ENETUNREACH\n')
      expect(stdout).toEqual([])
    })
  })
})
