/**
 * Serial Transport
 *
 * Owns the OS handle to the instrument's serial port and turns its byte stream
 * into terminated lines. Every read is bounded by a timeout and can be cut short
 * with an AbortSignal, so a disconnect never waits out a pending read.
 *
 * The serial profile is fixed: 8 data bits, no parity, 1 stop bit, no flow control.
 */

import { SerialPort } from 'serialport'

import log from './logger'
import { DEFAULT_BAUD_RATE, ScpiLineFramer } from './scpi-protocol'

// ============================================================================
// Type Definitions
// ============================================================================

export interface SerialTransportOptions {
  path: string
  baudRate?: number
}

export type LineReadResult = { kind: 'line'; bytes: Buffer } | { kind: 'timeout'; partial: Buffer }

/**
 * Line-oriented, half-duplex link to the instrument. Only one reader may wait
 * at a time; the poller that owns the transport is that reader.
 */
export interface SerialTransport {
  readonly isOpen: boolean
  write(data: Buffer): Promise<void>
  readLine(timeoutMs: number, signal?: AbortSignal): Promise<LineReadResult>
  /** Return and discard complete lines nobody asked for */
  drain(): string[]
  close(): Promise<void>
}

/**
 * The part of a `serialport` SerialPort the transport uses.
 */
export interface SerialPortHandle {
  readonly isOpen: boolean
  on(event: 'data', listener: (data: Buffer) => void): unknown
  on(event: 'error', listener: (error: Error) => void): unknown
  on(event: 'close', listener: () => void): unknown
  write(data: Buffer, callback: (error: Error | null | undefined) => void): unknown
  drain(callback: (error: Error | null) => void): void
  close(callback: (error: Error | null) => void): void
}

export interface SerialPortSummary {
  path: string
  manufacturer: string | null
  serialNumber: string | null
  vendorId: string | null
  productId: string | null
  isLikelyMultimeter: boolean
}

// ============================================================================
// Custom Errors
// ============================================================================

export type TransportErrorKind = 'open' | 'read' | 'write' | 'closed' | 'aborted'

/**
 *
 */
export class TransportError extends Error {
  readonly kind: TransportErrorKind

  /**
   *
   * @param kind
   * @param message
   */
  constructor(kind: TransportErrorKind, message: string) {
    super(message)
    this.name = 'TransportError'
    this.kind = kind
  }
}

// ============================================================================
// Node SerialPort Transport
// ============================================================================

interface PendingRead {
  resolve: (result: LineReadResult) => void
  reject: (error: Error) => void
  cleanup: () => void
}

/**
 * SerialTransport backed by the `serialport` package.
 */
export class NodeSerialTransport implements SerialTransport {
  private readonly framer = new ScpiLineFramer()
  private readonly lines: string[] = []
  private pendingRead: PendingRead | null = null
  private failure: TransportError | null = null

  /**
   *
   * @param port - An already opened port
   */
  constructor(private readonly port: SerialPortHandle) {
    port.on('data', (data: Buffer) => this.handleData(data))
    port.on('error', (error: Error) => this.fail(new TransportError('read', `Serial port error: ${error.message}`)))
    port.on('close', () => this.fail(new TransportError('closed', 'Serial port closed')))
  }

  get isOpen(): boolean {
    return this.port.isOpen && this.failure === null
  }

  /**
   *
   * @param data
   */
  async write(data: Buffer): Promise<void> {
    if (this.failure) {
      throw this.failure
    }

    await new Promise<void>((resolve, reject) => {
      this.port.write(data, (error) => {
        if (error) {
          reject(new TransportError('write', `Write failed: ${error.message}`))
          return
        }
        this.port.drain((drainError) => {
          if (drainError) {
            reject(new TransportError('write', `Drain failed: ${drainError.message}`))
          } else {
            resolve()
          }
        })
      })
    })
  }

  /**
   * Wait for the next complete line.
   * @param timeoutMs - Upper bound on the wait
   * @param signal - Aborts the wait immediately
   * @returns The line (terminator included), or a timeout carrying any partial bytes
   * @throws TransportError on I/O failure, close or abort
   */
  readLine(timeoutMs: number, signal?: AbortSignal): Promise<LineReadResult> {
    if (this.failure) {
      return Promise.reject(this.failure)
    }
    if (signal?.aborted) {
      return Promise.reject(new TransportError('aborted', 'Read aborted'))
    }

    const queued = this.lines.shift()
    if (queued !== undefined) {
      return Promise.resolve({ kind: 'line', bytes: Buffer.from(queued, 'latin1') })
    }

    if (this.pendingRead) {
      return Promise.reject(new TransportError('read', 'A read is already pending'))
    }

    return new Promise<LineReadResult>((resolve, reject) => {
      const onAbort = (): void => {
        this.settleRead()?.reject(new TransportError('aborted', 'Read aborted'))
      }
      const timer = setTimeout(() => {
        const partial = Buffer.from(this.framer.takePartial(), 'latin1')
        this.settleRead()?.resolve({ kind: 'timeout', partial })
      }, timeoutMs)

      signal?.addEventListener('abort', onAbort, { once: true })
      this.pendingRead = {
        resolve,
        reject,
        cleanup: () => {
          clearTimeout(timer)
          signal?.removeEventListener('abort', onAbort)
        },
      }
    })
  }

  drain(): string[] {
    return this.lines.splice(0, this.lines.length)
  }

  async close(): Promise<void> {
    this.fail(new TransportError('closed', 'Serial port closed'))
    if (!this.port.isOpen) {
      return
    }

    await new Promise<void>((resolve, reject) => {
      this.port.close((error) => {
        if (error) {
          reject(new TransportError('closed', `Close failed: ${error.message}`))
        } else {
          resolve()
        }
      })
    })
  }

  /**
   *
   * @param data
   */
  private handleData(data: Buffer): void {
    this.lines.push(...this.framer.feed(data))

    const next = this.pendingRead ? this.lines.shift() : undefined
    if (next !== undefined) {
      this.settleRead()?.resolve({ kind: 'line', bytes: Buffer.from(next, 'latin1') })
    }
  }

  /**
   *
   * @param error
   */
  private fail(error: TransportError): void {
    if (!this.failure) {
      this.failure = error
    }
    this.settleRead()?.reject(error)
  }

  /**
   * Detach the pending read, clearing its timer and abort listener.
   */
  private settleRead(): PendingRead | null {
    const pending = this.pendingRead
    if (pending) {
      pending.cleanup()
      this.pendingRead = null
    }
    return pending
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Open the instrument's serial port with the fixed 8N1 profile.
 * @param options
 * @throws TransportError('open') if the port cannot be opened
 */
export async function openSerialTransport(options: SerialTransportOptions): Promise<SerialTransport> {
  const baudRate = options.baudRate ?? DEFAULT_BAUD_RATE
  log.info(`[SerialTransport] Opening ${options.path} (${baudRate}, 8N1)`)

  const port = new SerialPort({
    path: options.path,
    baudRate,
    dataBits: 8,
    parity: 'none',
    stopBits: 1,
    rtscts: false,
    autoOpen: false,
  })

  await new Promise<void>((resolve, reject) => {
    port.open((error) => {
      if (error) {
        reject(new TransportError('open', `Failed to open port ${options.path}: ${error.message}`))
      } else {
        resolve()
      }
    })
  })

  return new NodeSerialTransport(port)
}

/**
 * Run `fn` with an open transport and close it on every exit path.
 * @param options
 * @param fn
 * @param open - Transport factory
 */
export async function withSerialTransport<T>(
  options: SerialTransportOptions,
  fn: (transport: SerialTransport) => Promise<T>,
  open: (options: SerialTransportOptions) => Promise<SerialTransport> = openSerialTransport
): Promise<T> {
  const transport = await open(options)
  try {
    return await fn(transport)
  } finally {
    try {
      await transport.close()
    } catch (error) {
      log.error(`[SerialTransport] Error closing ${options.path}:`, error)
    }
  }
}

/**
 * Enumerate serial ports, flagging USB-serial bridges used by OWON meters (WCH CH340).
 */
export async function listSerialPorts(): Promise<SerialPortSummary[]> {
  const ports = await SerialPort.list()
  return ports.map((port) => {
    const manufacturer = port.manufacturer ?? null
    const vendorId = port.vendorId ?? null
    return {
      path: port.path,
      manufacturer,
      serialNumber: port.serialNumber ?? null,
      vendorId,
      productId: port.productId ?? null,
      isLikelyMultimeter: vendorId?.toLowerCase() === '1a86' || /owon|wch/i.test(manufacturer ?? ''),
    }
  })
}
