// * CSV Recording Sink
// * Reference RecordingSink writing one CSV file per session.
// * Rows are buffered and appended in batches (periodic flush, or immediately when the buffer fills).
// * CSV SCHEMA:
// * index,timestamp,mode,range,value,overflow,unit
// * 0,2026-01-05T12:00:01.123Z,dcv,auto,1.2345,false,V

import * as fs from 'fs/promises'
import * as path from 'path'
import { v4 as uuidv4 } from 'uuid'

import type { RecordingRecord } from '../types/multimeter'
import log from './logger'
import type { RecordingSink } from './recording-session'
import { SinkError } from './recording-session'

// ============================================================================
// Constants
// ============================================================================

export const CSV_HEADER = 'index,timestamp,mode,range,value,overflow,unit'

const DEFAULT_FLUSH_INTERVAL_MS = 200
const DEFAULT_MAX_BUFFERED_ROWS = 500

// ============================================================================
// Type Definitions
// ============================================================================

export interface CsvRecordingSinkOptions {
  /** Directory the session file is created in (created if missing) */
  directory: string
  flushIntervalMs?: number
  maxBufferedRows?: number
  scheduleInterval?: (handler: () => void, interval: number) => NodeJS.Timeout
  clearScheduledInterval?: (handle: NodeJS.Timeout) => void
}

// ============================================================================
// Helpers
// ============================================================================

/**
 *
 * @param field
 */
function csvField(field: string): string {
  return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field
}

/**
 * Render one record as a CSV row (no terminator). Overflow rows carry an empty value.
 * @param record
 */
export function recordToCsvRow(record: RecordingRecord): string {
  return [
    String(record.index),
    record.timestamp,
    record.mode,
    record.range,
    record.value === null ? '' : String(record.value),
    String(record.overflow),
    record.unit,
  ]
    .map(csvField)
    .join(',')
}

// ============================================================================
// CsvRecordingSink Class
// ============================================================================

/**
 * A failed batch is reported by rejecting the next record() call (or close()).
 */
export class CsvRecordingSink implements RecordingSink {
  readonly sessionId: string
  readonly filePath: string

  private rows: string[] = []
  private rowsWritten = 0
  private pendingFailure: SinkError | null = null
  private flushing: Promise<void> = Promise.resolve()
  private flushHandle: NodeJS.Timeout | null = null
  private closed = false
  private readonly maxBufferedRows: number
  private readonly clearScheduledInterval: (handle: NodeJS.Timeout) => void

  /**
   * Use CsvRecordingSink.create(); the constructor does no I/O.
   * @param options
   * @param sessionId
   */
  private constructor(options: CsvRecordingSinkOptions, sessionId: string) {
    this.sessionId = sessionId
    this.filePath = path.join(options.directory, `recording-${sessionId}.csv`)
    this.maxBufferedRows = options.maxBufferedRows ?? DEFAULT_MAX_BUFFERED_ROWS
    this.clearScheduledInterval = options.clearScheduledInterval ?? clearInterval

    const scheduleInterval = options.scheduleInterval ?? setInterval
    this.flushHandle = scheduleInterval(() => {
      this.flush().catch((error) => {
        log.error(`[CsvRecordingSink] Periodic flush error:`, error)
      })
    }, options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS)
  }

  /**
   * Create the session file with its header row.
   * @param options
   */
  static async create(options: CsvRecordingSinkOptions): Promise<CsvRecordingSink> {
    const sessionId = uuidv4()
    await fs.mkdir(options.directory, { recursive: true })
    await fs.writeFile(path.join(options.directory, `recording-${sessionId}.csv`), CSV_HEADER + '\n', 'utf-8')
    log.info(`[CsvRecordingSink] Session ${sessionId} recording to ${options.directory}`)
    return new CsvRecordingSink(options, sessionId)
  }

  /**
   *
   * @param record
   */
  async record(record: RecordingRecord): Promise<void> {
    if (this.closed) {
      throw new SinkError('Sink is closed', record.index)
    }
    this.throwPendingFailure()

    this.rows.push(recordToCsvRow(record))
    if (this.rows.length >= this.maxBufferedRows) {
      await this.flush()
      this.throwPendingFailure()
    }
  }

  /**
   * Append all buffered rows. Concurrent calls are serialized.
   */
  flush(): Promise<void> {
    this.flushing = this.flushing.then(() => this.writeBatch())
    return this.flushing
  }

  async close(): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true

    if (this.flushHandle) {
      this.clearScheduledInterval(this.flushHandle)
      this.flushHandle = null
    }

    await this.flush()
    log.info(`[CsvRecordingSink] Session ${this.sessionId} closed (${this.rowsWritten} rows)`)
    this.throwPendingFailure()
  }

  getRowsWritten(): number {
    return this.rowsWritten
  }

  /**
   *
   */
  private async writeBatch(): Promise<void> {
    if (this.rows.length === 0) {
      return
    }

    const batch = this.rows
    this.rows = []

    try {
      await fs.appendFile(this.filePath, batch.map((row) => row + '\n').join(''), 'utf-8')
      this.rowsWritten += batch.length
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.pendingFailure = new SinkError(`Failed to append ${batch.length} rows to ${this.filePath}: ${message}`, null, error)
    }
  }

  /**
   *
   */
  private throwPendingFailure(): void {
    const failure = this.pendingFailure
    if (failure) {
      this.pendingFailure = null
      throw failure
    }
  }
}
