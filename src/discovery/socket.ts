/**
 * DiscoverySocket: a UDP socket with pull-style, timeout-bounded receives.
 *
 * `node:dgram` pushes datagrams through 'message' events. The receive loop
 * wants the opposite: ask for the next datagram and give up after a fixed
 * interval. Datagrams that arrive while nobody is waiting are queued and
 * handed out in arrival order.
 */

import { createSocket, type Socket } from 'node:dgram'
import { ReceiveTimeoutError, SocketError } from './errors.js'

export interface RawDatagram {
  sourceAddress: string
  sourcePort: number
  payload: Buffer
}

export interface OpenSocketOptions {
  /** Per-receive timeout in milliseconds */
  timeoutMs: number
  /** Multicast TTL for outgoing datagrams (default: 2) */
  multicastTtl?: number
  /** Local port to bind (default: ephemeral) */
  bindPort?: number
}

/** Largest delay setTimeout honours; longer delays fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

interface PendingReceive {
  resolve: (datagram: RawDatagram) => void
  reject: (err: Error) => void
  timer: ReturnType<typeof setTimeout>
}

export class DiscoverySocket {
  private readonly queue: RawDatagram[] = []
  private pending: PendingReceive | null = null
  private failure: SocketError | null = null
  private closed = false

  constructor(
    private readonly socket: Socket,
    readonly timeoutMs: number,
  ) {
    socket.on('message', (msg, rinfo) => {
      this.deliver({ sourceAddress: rinfo.address, sourcePort: rinfo.port, payload: msg })
    })
    socket.on('error', (err) => {
      this.fail(err)
    })
  }

  /**
   * Create a udp4 socket bound to an ephemeral port, ready to send multicast.
   */
  static open(options: OpenSocketOptions): Promise<DiscoverySocket> {
    return new Promise<DiscoverySocket>((resolve, reject) => {
      const socket = createSocket({ type: 'udp4', reuseAddr: true })

      const onBindError = (err: Error) => {
        try {
          socket.close()
        } catch {
          // Bind failed before the handle opened
        }
        reject(err)
      }
      socket.once('error', onBindError)

      socket.bind({ port: options.bindPort ?? 0 }, () => {
        socket.removeListener('error', onBindError)
        try {
          socket.setMulticastTTL(options.multicastTtl ?? 2)
        } catch (err) {
          socket.close()
          reject(err)
          return
        }
        resolve(new DiscoverySocket(socket, options.timeoutMs))
      })
    })
  }

  /** Send a payload to the given address. */
  send(payload: Buffer, port: number, address: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new SocketError('Socket is closed'))
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.send(payload, 0, payload.length, port, address, (err) => {
        if (err) reject(err)
        else resolve()
      })
    })
  }

  /**
   * Wait for the next datagram.
   *
   * Rejects with ReceiveTimeoutError when nothing arrives within `timeoutMs`,
   * and with SocketError once the socket has failed or been closed. Only one
   * receive may be outstanding at a time. Waits longer than
   * MAX_TIMER_DELAY_MS are capped to it.
   */
  receive(timeoutMs: number = this.timeoutMs): Promise<RawDatagram> {
    const queued = this.queue.shift()
    if (queued) return Promise.resolve(queued)
    if (this.failure) return Promise.reject(this.failure)
    if (this.closed) return Promise.reject(new SocketError('Socket is closed'))
    if (this.pending) return Promise.reject(new SocketError('A receive is already pending'))

    return new Promise<RawDatagram>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null
        reject(new ReceiveTimeoutError(timeoutMs))
      }, Math.min(timeoutMs, MAX_TIMER_DELAY_MS))
      this.pending = { resolve, reject, timer }
    })
  }

  /**
   * Close the underlying socket. Calling it again is a no-op, so the socket
   * is released exactly once.
   */
  close(): Promise<void> {
    if (this.closed) return Promise.resolve()
    this.closed = true

    const pending = this.takePending()
    pending?.reject(new SocketError('Socket closed while receiving'))

    return new Promise<void>((resolve) => {
      this.socket.close(() => resolve())
    })
  }

  get isClosed(): boolean {
    return this.closed
  }

  private deliver(datagram: RawDatagram): void {
    if (this.closed) return
    const pending = this.takePending()
    if (pending) pending.resolve(datagram)
    else this.queue.push(datagram)
  }

  private fail(err: Error): void {
    this.failure = new SocketError(`Socket error: ${err.message}`, { cause: err })
    this.takePending()?.reject(this.failure)
  }

  private takePending(): PendingReceive | null {
    const pending = this.pending
    if (!pending) return null
    this.pending = null
    clearTimeout(pending.timer)
    return pending
  }
}
