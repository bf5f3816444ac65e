// * Recording Session
// * Hands measurements to an external writer (CSV, spreadsheet, JSON) without ever blocking the poll loop.
// * ARCHITECTURE:
// * - offer() is synchronous: it converts the measurement and chains the write behind earlier ones
// * - Writes are serialized, so a sink sees records strictly in index order
// * - A failed write becomes a SinkError 'error' event; recording and polling continue
// * - Rolling in-memory buffer of the last `bufferDepth` records for display
// * MODES:
// * - continuous: every measurement
// * - fixed-interval: the latest measurement once per interval (ticks without a new measurement are skipped)
// * - manual: only captureNow()

import EventEmitter from 'events'

import type { Measurement, RecordingMode, RecordingRecord, TimestampFormat } from '../types/multimeter'
import log from './logger'
import { InvalidConfigValueError, MAX_BUFFER_DEPTH, validateInteger } from './multimeter-config'

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Destination for recorded measurements. A rejected promise is reported as a
 * SinkError and does not stop the session.
 */
export interface RecordingSink {
  record(record: RecordingRecord): Promise<void>
  close?(): Promise<void>
}

export interface RecordingSessionOptions {
  mode: RecordingMode
  /** Required for 'fixed-interval' */
  intervalMs?: number
  bufferDepth: number
  /** Defaults to 'rfc3339' */
  timestampFormat?: TimestampFormat
  scheduleInterval?: (handler: () => void, interval: number) => NodeJS.Timeout
  clearScheduledInterval?: (handle: NodeJS.Timeout) => void
}

export interface RecordingStats {
  mode: RecordingMode
  active: boolean
  recordsQueued: number
  recordsWritten: number
  failures: number
}

// ============================================================================
// Custom Errors
// ============================================================================

/**
 *
 */
export class SinkError extends Error {
  readonly recordIndex: number | null

  /**
   *
   * @param message
   * @param recordIndex - Index of the record that failed, if known
   * @param cause
   */
  constructor(message: string, recordIndex: number | null = null, cause?: unknown) {
    super(message, { cause })
    this.name = 'SinkError'
    this.recordIndex = recordIndex
  }
}

// ============================================================================
// Conversion
// ============================================================================

/**
 *
 * @param wallClock - RFC 3339 time
 * @param format
 */
export function formatTimestamp(wallClock: string, format: TimestampFormat): string {
  return format === 'unix' ? (Date.parse(wallClock) / 1000).toFixed(3) : wallClock
}

/**
 * Flatten a measurement into the record shape handed to writers.
 * @param measurement
 * @param index - Sequence number within the session, starting at 0
 * @param timestampFormat
 */
export function toRecordingRecord(
  measurement: Measurement,
  index: number,
  timestampFormat: TimestampFormat = 'rfc3339'
): RecordingRecord {
  const overflow = measurement.value.kind === 'overflow'
  return {
    index,
    timestamp: formatTimestamp(measurement.timestamp.wallClock, timestampFormat),
    monotonicMs: measurement.timestamp.monotonicMs,
    mode: measurement.mode,
    range: measurement.range.kind === 'auto' ? 'auto' : measurement.range.label,
    value: measurement.value.kind === 'numeric' ? measurement.value.value : null,
    overflow,
    unit: measurement.unit,
  }
}

// ============================================================================
// RecordingSession Class
// ============================================================================

/**
 * EVENT EMISSION: 'record' (RecordingRecord), 'error' (SinkError), 'stopped'.
 */
export class RecordingSession extends EventEmitter {
  readonly mode: RecordingMode

  private readonly sink: RecordingSink
  private readonly bufferDepth: number
  private readonly timestampFormat: TimestampFormat
  private readonly intervalMs: number | null
  private readonly scheduleInterval: (handler: () => void, interval: number) => NodeJS.Timeout
  private readonly clearScheduledInterval: (handle: NodeJS.Timeout) => void

  private active = false
  private intervalHandle: NodeJS.Timeout | null = null
  private latest: Measurement | null = null
  private lastRecorded: Measurement | null = null
  private nextIndex = 0
  private buffer: RecordingRecord[] = []
  private writeChain: Promise<void> = Promise.resolve()
  private recordsWritten = 0
  private failures = 0

  /**
   *
   * @param sink
   * @param options
   */
  constructor(sink: RecordingSink, options: RecordingSessionOptions) {
    super()
    this.sink = sink
    this.mode = options.mode
    this.bufferDepth = validateInteger('bufferDepth', options.bufferDepth, 1, MAX_BUFFER_DEPTH)
    this.timestampFormat = options.timestampFormat ?? 'rfc3339'
    this.scheduleInterval = options.scheduleInterval ?? setInterval
    this.clearScheduledInterval = options.clearScheduledInterval ?? clearInterval

    if (options.mode === 'fixed-interval') {
      if (options.intervalMs === undefined) {
        throw new InvalidConfigValueError('intervalMs', 'intervalMs is required for fixed-interval recording')
      }
      this.intervalMs = validateInteger('intervalMs', options.intervalMs, 1)
    } else {
      this.intervalMs = null
    }
  }

  start(): void {
    if (this.active) {
      return
    }
    this.active = true

    if (this.intervalMs !== null) {
      this.intervalHandle = this.scheduleInterval(() => this.captureLatest(), this.intervalMs)
    }
    log.info(`[RecordingSession] Started (${this.mode}${this.intervalMs ? `, every ${this.intervalMs}ms` : ''})`)
  }

  /**
   * Stop accepting measurements, wait for queued writes and close the sink.
   */
  async stop(): Promise<void> {
    if (!this.active) {
      return
    }
    this.active = false

    if (this.intervalHandle) {
      this.clearScheduledInterval(this.intervalHandle)
      this.intervalHandle = null
    }

    await this.flush()

    if (this.sink.close) {
      try {
        await this.sink.close()
      } catch (error) {
        this.reportFailure(new SinkError(`Failed to close sink: ${describeError(error)}`, null, error))
      }
    }

    log.info(`[RecordingSession] Stopped after ${this.recordsWritten} records (${this.failures} failures)`)
    this.emit('stopped')
  }

  /**
   * Accept a new measurement from the poll loop. Never blocks and never throws.
   * @param measurement
   */
  offer(measurement: Measurement): void {
    this.latest = measurement
    if (this.active && this.mode === 'continuous') {
      this.enqueue(measurement)
    }
  }

  /**
   * Record the latest measurement now, whatever the mode.
   * @returns The queued record, or null if nothing was measured yet or the session is stopped
   */
  captureNow(): RecordingRecord | null {
    if (!this.active || !this.latest) {
      return null
    }
    return this.enqueue(this.latest)
  }

  /**
   * Resolves once every queued write has settled.
   */
  flush(): Promise<void> {
    return this.writeChain
  }

  isActive(): boolean {
    return this.active
  }

  getBuffer(): readonly RecordingRecord[] {
    return this.buffer
  }

  getStats(): RecordingStats {
    return {
      mode: this.mode,
      active: this.active,
      recordsQueued: this.nextIndex,
      recordsWritten: this.recordsWritten,
      failures: this.failures,
    }
  }

  /**
   *
   */
  private captureLatest(): void {
    if (!this.latest || this.latest === this.lastRecorded) {
      return
    }
    this.enqueue(this.latest)
  }

  /**
   *
   * @param measurement
   */
  private enqueue(measurement: Measurement): RecordingRecord {
    const record = toRecordingRecord(measurement, this.nextIndex++, this.timestampFormat)
    this.lastRecorded = measurement

    this.buffer.push(record)
    if (this.buffer.length > this.bufferDepth) {
      this.buffer = this.buffer.slice(-this.bufferDepth)
    }

    this.emit('record', record)
    this.writeChain = this.writeChain.then(() => this.write(record))
    return record
  }

  /**
   *
   * @param record
   */
  private async write(record: RecordingRecord): Promise<void> {
    try {
      await this.sink.record(record)
      this.recordsWritten++
    } catch (error) {
      const sinkError =
        error instanceof SinkError
          ? error
          : new SinkError(`Failed to write record ${record.index}: ${describeError(error)}`, record.index, error)
      this.reportFailure(sinkError)
    }
  }

  /**
   *
   * @param error
   */
  private reportFailure(error: SinkError): void {
    this.failures++
    log.error(`[RecordingSession] ${error.message}`)
    if (this.listenerCount('error') > 0) {
      this.emit('error', error)
    }
  }
}

/**
 *
 * @param error
 */
function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
