// * Multimeter Poller (TypeScript)
// * Owns the serial transport and drives the instrument: sync burst, measurement polling, host commands.
// * ARCHITECTURE:
// * - Strictly sequential query/response: at most one query outstanding at any time
// * - After sync, the host's rate, beeper and threshold settings are written and read back
// * - Host commands are applied optimistically, queued, and written between queries
// * - Set commands with a readback are followed by that query so the optimistic value gets confirmed
// * - Every N measurements a FUNC? readback catches mode changes made on the front panel
// * - A UI refresh timer publishes { snapshot, measurement } independently of the poll rate
// * - Timeouts leave the snapshot untouched; N in a row declare the device unresponsive and disconnect
// * EVENT EMISSION: 'state-change', 'snapshot', 'measurement', 'refresh', 'correction', 'warning', 'error'.
// ! Single owner: nothing else may read from or write to the transport while the poller holds it.

import EventEmitter from 'events'
import { performance } from 'perf_hooks'

import type {
  ConnectionState,
  DeviceSnapshot,
  Measurement,
  MeasurementMode,
  MultimeterHealth,
  RangeSetting,
  RecordingRecord,
  RefreshFrame,
  SampleRate,
  SyncField,
  ThresholdKind,
} from '../types/multimeter'
import type { Correction, SnapshotReader } from './device-state'
import { DeviceStateMachine, InvalidTransitionError, SYNC_FIELDS } from './device-state'
import log from './logger'
import type { MultimeterConfig } from './multimeter-config'
import { DEFAULT_CONFIG, createMultimeterConfig } from './multimeter-config'
import type { RecordingSession } from './recording-session'
import type { RawToken, ScpiCommand, ScpiQuery, ScpiSetCommand } from './scpi-protocol'
import { DecodeError, decode, encode, findRangeOption, formatCommand, InvalidCommandError, isQuery } from './scpi-protocol'
import type { ParsedUpdate, ParseOptions } from './scpi-response-parser'
import { parse } from './scpi-response-parser'
import type { SerialTransport, SerialTransportOptions } from './serial-transport'
import { openSerialTransport, TransportError } from './serial-transport'

// ============================================================================
// Constants
// ============================================================================

/** Sync burst, in order. RANGE? precedes AUTO? so a fixed range is known before auto-range is read back. */
const SYNC_QUERIES: readonly (readonly [ScpiQuery, SyncField])[] = [
  [{ type: 'identify' }, 'identity'],
  [{ type: 'queryFunction' }, 'mode'],
  [{ type: 'queryRange' }, 'range'],
  [{ type: 'queryAutoRange' }, 'range'],
  [{ type: 'queryBeeper' }, 'beeper'],
  [{ type: 'queryThreshold', threshold: 'continuity' }, 'continuityThreshold'],
  [{ type: 'queryThreshold', threshold: 'diode' }, 'diodeThreshold'],
]

/** Rounds of the sync burst before giving up on fields that never confirmed */
const SYNC_ATTEMPTS = 3

const THRESHOLD_KINDS: readonly ThresholdKind[] = ['continuity', 'diode']

const MEASURE: ScpiQuery = { type: 'measure' }
const QUERY_FUNCTION: ScpiQuery = { type: 'queryFunction' }

// ============================================================================
// Custom Errors
// ============================================================================

/**
 *
 */
export class DeviceUnresponsiveError extends Error {
  readonly consecutiveTimeouts: number

  /**
   *
   * @param message
   * @param consecutiveTimeouts
   */
  constructor(message: string, consecutiveTimeouts = 0) {
    super(message)
    this.name = 'DeviceUnresponsiveError'
    this.consecutiveTimeouts = consecutiveTimeouts
  }
}

/**
 * Sync burst ended with fields the device never confirmed.
 */
export class SyncError extends Error {
  readonly missing: readonly SyncField[]

  /**
   *
   * @param missing
   */
  constructor(missing: readonly SyncField[]) {
    super(`Device did not confirm: ${missing.join(', ')}`)
    this.name = 'SyncError'
    this.missing = missing
  }
}

/** How a written set command lands in the snapshot */
type CommandApplication = 'optimistic' | 'assumed' | 'none'

/**
 *
 * @param error
 */
function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 *
 * @param error
 */
function isAbort(error: unknown): boolean {
  return error instanceof TransportError && error.kind === 'aborted'
}

// ============================================================================
// MultimeterPoller Class
// ============================================================================

/**
 *
 */
export class MultimeterPoller extends EventEmitter {
  private config: MultimeterConfig
  private readonly machine = new DeviceStateMachine()
  private transport: SerialTransport | null = null
  private abortController: AbortController | null = null

  // Connection parameters for reconnection
  private lastPort: string | null = null
  private lastBaud: number

  // Poll loop state
  private pollHandle: NodeJS.Timeout | null = null
  private refreshHandle: NodeJS.Timeout | null = null
  private inFlight: Promise<void> | null = null
  private disconnecting: Promise<void> | null = null
  private commandQueue: ScpiCommand[] = []
  private outstanding: ScpiQuery | null = null
  private consecutiveTimeouts = 0
  private measurementsSinceFunction = 0

  // Measurement tracking
  private latestMeasurement: Measurement | null = null
  private lastMeasurementAt: number | null = null
  private measurementsReceived = 0
  private recording: RecordingSession | null = null

  /**
   *
   * @param config
   */
  constructor(config: MultimeterConfig = DEFAULT_CONFIG) {
    super()
    this.config = config
    this.lastBaud = config.baudRate
    this.machine.snapshots.subscribe((snapshot) => this.emit('snapshot', snapshot))
  }

  // Allow tests to override scheduling behavior
  /**
   *
   * @param callback
   * @param periodMs
   */
  protected scheduleInterval(callback: () => void, periodMs: number): NodeJS.Timeout {
    return setInterval(callback, periodMs)
  }

  /**
   *
   * @param handle
   */
  protected clearScheduledInterval(handle: NodeJS.Timeout): void {
    clearInterval(handle)
  }

  // ========================================================================
  // Factory Methods (for test injection)
  // ========================================================================

  /**
   * Open the transport (protected for test injection).
   * @param options
   */
  protected createTransport(options: SerialTransportOptions): Promise<SerialTransport> {
    return openSerialTransport(options)
  }

  // ========================================================================
  // Connection Management
  // ========================================================================

  // * Open the port, run the sync burst and start polling. Resolves once the device is ready.
  /**
   *
   * @param port
   * @param baudRate
   */
  async connect(port: string, baudRate = this.config.baudRate): Promise<void> {
    log.info(`[MultimeterPoller] connect() called - port: ${port}, baudRate: ${baudRate}, state: ${this.machine.state}`)

    if (this.machine.state !== 'disconnected') {
      throw new InvalidTransitionError(this.machine.state, 'connecting')
    }

    this.lastPort = port
    this.lastBaud = baudRate
    this.machine.transition('connecting')
    this.emitStateChange()

    const abortController = new AbortController()
    this.abortController = abortController

    let transport: SerialTransport
    try {
      transport = await this.createTransport({ path: port, baudRate })
    } catch (error) {
      log.error(`[MultimeterPoller] Failed to open ${port}:`, error)
      this.abortController = null
      if (this.machine.state !== 'disconnected') {
        this.machine.transition('disconnected', describeError(error))
        this.emitStateChange()
      }
      throw error
    }

    if (abortController.signal.aborted) {
      // disconnect() ran while the port was opening
      await transport.close()
      throw new TransportError('aborted', 'Connect aborted')
    }
    this.transport = transport

    try {
      this.machine.transition('syncing')
      this.emitStateChange()
      await this.synchronize()
      await this.pushHostSettings()

      if (this.config.lockRemoteOnConnect) {
        await this.sendCommand({ type: 'setRemoteLock', locked: true })
      }

      this.machine.transition('ready')
      this.emitStateChange()
    } catch (error) {
      log.error('[MultimeterPoller] Sync failed:', error)
      await this.disconnect(describeError(error))
      throw error
    }

    this.startTimers()

    const identity = this.machine.snapshot.identity
    log.info(`[MultimeterPoller] Connected to ${identity?.model ?? 'unknown model'} (firmware ${identity?.firmware ?? '?'})`)
  }

  // * Stop polling, abort any pending read, release remote lock and close the port.
  /**
   *
   * @param reason - Kept as the snapshot's last error
   */
  disconnect(reason?: string): Promise<void> {
    if (this.disconnecting) {
      return this.disconnecting
    }
    if (this.machine.state === 'disconnected') {
      return Promise.resolve()
    }

    this.disconnecting = this.teardown(reason).finally(() => {
      this.disconnecting = null
    })
    return this.disconnecting
  }

  // * Reconnect using the last known port/baud.
  /**
   *
   */
  async reconnect(): Promise<void> {
    if (!this.lastPort) {
      throw new TransportError('open', 'Cannot reconnect: no previous connection')
    }

    log.info(`[MultimeterPoller] Reconnecting to ${this.lastPort}...`)

    if (this.machine.state !== 'disconnected') {
      await this.disconnect()
    }

    await this.connect(this.lastPort, this.lastBaud)
  }

  // ========================================================================
  // Host Commands
  // ========================================================================

  /**
   * Switch measurement function, optionally with a fixed range.
   * @param mode
   * @param range - RangeSetting, a range label/argument such as "5V", or 'auto'
   */
  setMode(mode: MeasurementMode, range: RangeSetting | string = { kind: 'auto' }): DeviceSnapshot {
    const snapshot = this.enqueue({ type: 'configure', mode, range: this.resolveRange(mode, range) }, [
      QUERY_FUNCTION,
      { type: 'queryRange' },
      { type: 'queryAutoRange' },
    ])

    if (mode === 'continuity' || mode === 'diode') {
      return this.reassertThresholdSettings(mode)
    }
    return snapshot
  }

  /**
   * Change range within the current mode.
   * @param range
   */
  setRange(range: RangeSetting | string): DeviceSnapshot {
    const mode = this.machine.snapshot.mode
    if (!mode || mode === 'diodeContinuityAmbiguous') {
      throw new InvalidCommandError(`Cannot set a range while the mode is ${mode ?? 'unknown'}`)
    }
    return this.setMode(mode, range)
  }

  /**
   *
   * @param enabled
   */
  setBeeper(enabled: boolean): DeviceSnapshot {
    const snapshot = this.enqueue({ type: 'setBeeper', enabled }, [{ type: 'queryBeeper' }])
    this.config = createMultimeterConfig({ ...this.config, beeperEnabled: enabled })
    return snapshot
  }

  /**
   *
   * @param threshold
   * @param value
   */
  setThreshold(threshold: ThresholdKind, value: number): DeviceSnapshot {
    const snapshot = this.enqueue({ type: 'setThreshold', threshold, value }, [{ type: 'queryThreshold', threshold }])
    this.config = createMultimeterConfig(
      threshold === 'continuity'
        ? { ...this.config, continuityThreshold: value }
        : { ...this.config, diodeThreshold: value }
    )
    return snapshot
  }

  /**
   *
   * @param rate
   */
  setRate(rate: SampleRate): DeviceSnapshot {
    const snapshot = this.enqueue({ type: 'setRate', rate }, [])
    this.config = createMultimeterConfig({ ...this.config, sampleRate: rate })
    return snapshot
  }

  /**
   *
   * @param locked
   */
  setRemoteLock(locked: boolean): DeviceSnapshot {
    return this.enqueue({ type: 'setRemoteLock', locked }, [])
  }

  /**
   * Send *RST and read every sync field back. The host settings are not written
   * again; the snapshot shows the instrument's defaults.
   */
  resetDevice(): DeviceSnapshot {
    return this.enqueue(
      { type: 'reset' },
      SYNC_QUERIES.map(([query]) => query)
    )
  }

  /**
   *
   * @param intervalMs
   */
  setPollInterval(intervalMs: number): void {
    this.config = createMultimeterConfig({ ...this.config, pollIntervalMs: intervalMs })
    if (this.pollHandle) {
      this.clearScheduledInterval(this.pollHandle)
      this.pollHandle = this.scheduleInterval(() => this.onPollTick(), intervalMs)
    }
    log.info(`[MultimeterPoller] Poll interval set to ${intervalMs}ms`)
  }

  /**
   *
   * @param intervalMs
   */
  setUiRefreshInterval(intervalMs: number): void {
    this.config = createMultimeterConfig({ ...this.config, uiRefreshIntervalMs: intervalMs })
    if (this.refreshHandle) {
      this.clearScheduledInterval(this.refreshHandle)
      this.refreshHandle = this.scheduleInterval(() => this.emitRefresh(), intervalMs)
    }
    log.info(`[MultimeterPoller] UI refresh interval set to ${intervalMs}ms`)
  }

  // ========================================================================
  // Recording
  // ========================================================================

  /**
   * Hand every new measurement to a recording session (null detaches).
   * @param session
   */
  attachRecording(session: RecordingSession | null): void {
    this.recording = session
  }

  /**
   * Record the latest measurement now.
   * @returns The queued record, or null without an active session or measurement
   */
  captureNow(): RecordingRecord | null {
    return this.recording?.captureNow() ?? null
  }

  // ========================================================================
  // Polling
  // ========================================================================

  /**
   * Run one poll cycle: queued commands, then MEAS? (and FUNC? when due).
   * Calls made while a cycle is running wait for that cycle.
   */
  async poll(): Promise<void> {
    if (this.inFlight) {
      return this.inFlight
    }
    if (this.machine.state !== 'ready') {
      return
    }

    const cycle = this.runCycle()
    this.inFlight = cycle.then(() => undefined)

    let failure: Error | null
    try {
      failure = await cycle
    } finally {
      this.inFlight = null
    }

    if (failure) {
      this.emitError(failure)
      await this.disconnect(failure.message)
    }
  }

  // ========================================================================
  // Status
  // ========================================================================

  getSnapshot(): DeviceSnapshot {
    return this.machine.snapshot
  }

  get snapshots(): SnapshotReader<DeviceSnapshot> {
    return this.machine.snapshots
  }

  getLatestMeasurement(): Measurement | null {
    return this.latestMeasurement
  }

  getState(): ConnectionState {
    return this.machine.state
  }

  getConfig(): MultimeterConfig {
    return this.config
  }

  isConnected(): boolean {
    return this.transport !== null && this.transport.isOpen && this.machine.state === 'ready'
  }

  // * Get current health/status data.
  /**
   *
   */
  getHealth(): MultimeterHealth {
    const snapshot = this.machine.snapshot
    return {
      connection: snapshot.connection,
      port: this.transport ? this.lastPort : null,
      model: snapshot.identity?.model ?? null,
      firmware: snapshot.firmwareVersion,
      consecutiveTimeouts: this.consecutiveTimeouts,
      outstandingQuery: this.outstanding ? formatCommand(this.outstanding) : null,
      queuedCommands: this.commandQueue.length,
      measurementsReceived: this.measurementsReceived,
      lastMeasurementAgeMs: this.lastMeasurementAt === null ? undefined : performance.now() - this.lastMeasurementAt,
      lastError: snapshot.lastError,
    }
  }

  // ========================================================================
  // Internal Helpers: Sync
  // ========================================================================

  /**
   * Query every sync field, retrying the ones that did not confirm. A field is
   * also queried again when an earlier answer in the same round unconfirmed it
   * (the mode, once *IDN? changes the diode/continuity mapping).
   * @throws SyncError if a field never confirms
   * @throws DeviceUnresponsiveError when the timeout limit is reached
   */
  private async synchronize(): Promise<void> {
    for (let attempt = 1; attempt <= SYNC_ATTEMPTS; attempt++) {
      const missing = SYNC_FIELDS.filter((field) => !this.machine.snapshot.confirmed.includes(field))
      if (missing.length === 0) {
        break
      }
      if (attempt > 1) {
        log.warn(`[MultimeterPoller] Sync attempt ${attempt}, unconfirmed: ${missing.join(', ')}`)
      }

      for (const [query, field] of SYNC_QUERIES) {
        if (missing.includes(field) || !this.machine.snapshot.confirmed.includes(field)) {
          await this.query(query)
        }
      }
    }

    if (!this.machine.isSyncComplete()) {
      throw new SyncError(SYNC_FIELDS.filter((field) => !this.machine.snapshot.confirmed.includes(field)))
    }
  }

  /**
   * Write the configured rate, beeper and thresholds, reading back the ones the
   * instrument reports. The rate has no readback and is taken as set.
   */
  private async pushHostSettings(): Promise<void> {
    await this.sendCommand({ type: 'setRate', rate: this.config.sampleRate }, 'assumed')

    await this.sendCommand({ type: 'setBeeper', enabled: this.config.beeperEnabled })
    await this.query({ type: 'queryBeeper' })

    for (const threshold of THRESHOLD_KINDS) {
      await this.sendCommand({ type: 'setThreshold', threshold, value: this.thresholdFor(threshold) })
      await this.query({ type: 'queryThreshold', threshold })
    }
  }

  /**
   *
   * @param threshold
   */
  private thresholdFor(threshold: ThresholdKind): number {
    return threshold === 'continuity' ? this.config.continuityThreshold : this.config.diodeThreshold
  }

  // ========================================================================
  // Internal Helpers: Poll Loop
  // ========================================================================

  /**
   *
   */
  private startTimers(): void {
    this.pollHandle = this.scheduleInterval(() => this.onPollTick(), this.config.pollIntervalMs)
    this.refreshHandle = this.scheduleInterval(() => this.emitRefresh(), this.config.uiRefreshIntervalMs)
    log.info(
      `[MultimeterPoller] Polling every ${this.config.pollIntervalMs}ms, UI refresh every ${this.config.uiRefreshIntervalMs}ms`
    )
  }

  /**
   *
   */
  private stopTimers(): void {
    if (this.pollHandle) {
      this.clearScheduledInterval(this.pollHandle)
      this.pollHandle = null
    }
    if (this.refreshHandle) {
      this.clearScheduledInterval(this.refreshHandle)
      this.refreshHandle = null
    }
  }

  /**
   *
   */
  private onPollTick(): void {
    this.poll().catch((error) => {
      log.error('[MultimeterPoller] Poll cycle failed:', error)
    })
  }

  /**
   * @returns The error that ends the connection, or null
   */
  private async runCycle(): Promise<Error | null> {
    try {
      await this.processCommandQueue()

      const update = await this.query(MEASURE)
      if (update?.measurement) {
        this.measurementsSinceFunction++
        if (this.measurementsSinceFunction >= this.config.functionPollEvery) {
          this.measurementsSinceFunction = 0
          await this.query(QUERY_FUNCTION)
        }
      }
      return null
    } catch (error) {
      if (isAbort(error)) {
        return null
      }
      const failure = error instanceof Error ? error : new Error(String(error))
      // Kept on the snapshot even if a disconnect is already under way
      this.machine.recordError(failure.message)
      return failure
    }
  }

  /**
   *
   */
  private async processCommandQueue(): Promise<void> {
    let command = this.commandQueue.shift()
    while (command) {
      if (isQuery(command)) {
        await this.query(command)
      } else {
        await this.sendCommand(command, 'none')
      }
      command = this.commandQueue.shift()
    }
  }

  /**
   * Apply a set command optimistically and queue it, followed by its readbacks.
   * @param command
   * @param readbacks
   * @throws InvalidCommandError if the command cannot be encoded
   * @throws TransportError if the device is not ready
   */
  private enqueue(command: ScpiSetCommand, readbacks: ScpiQuery[]): DeviceSnapshot {
    if (this.machine.state !== 'ready') {
      throw new TransportError('closed', `Not connected (state: ${this.machine.state})`)
    }

    // Validates the command before anything changes
    formatCommand(command)

    const snapshot = this.machine.applyCommand(command)
    this.commandQueue.push(command, ...readbacks)
    log.debug(`[MultimeterPoller] Queued ${formatCommand(command)} (${readbacks.length} readbacks)`)
    return snapshot
  }

  /**
   * Re-send the configured beeper and threshold for continuity/diode; the
   * instrument does not keep them across mode changes.
   * @param mode
   */
  private reassertThresholdSettings(mode: ThresholdKind): DeviceSnapshot {
    this.enqueue({ type: 'setBeeper', enabled: this.config.beeperEnabled }, [{ type: 'queryBeeper' }])
    return this.enqueue({ type: 'setThreshold', threshold: mode, value: this.thresholdFor(mode) }, [
      { type: 'queryThreshold', threshold: mode },
    ])
  }

  /**
   *
   * @param mode
   * @param range
   */
  private resolveRange(mode: MeasurementMode, range: RangeSetting | string): RangeSetting {
    if (typeof range === 'string') {
      if (range.trim().toLowerCase() === 'auto') {
        return { kind: 'auto' }
      }
      const option = findRangeOption(mode, range)
      if (!option) {
        throw new InvalidCommandError(`Range ${range} is not valid for mode ${mode}`)
      }
      return { kind: 'fixed', label: option.label, scpi: option.scpi }
    }

    if (range.kind === 'auto') {
      return range
    }
    const option = findRangeOption(mode, range.scpi) ?? findRangeOption(mode, range.label)
    if (!option) {
      throw new InvalidCommandError(`Range ${range.label} is not valid for mode ${mode}`)
    }
    return { kind: 'fixed', label: option.label, scpi: option.scpi }
  }

  // ========================================================================
  // Internal Helpers: Serial I/O
  // ========================================================================

  /**
   *
   */
  private requireTransport(): SerialTransport {
    if (!this.transport) {
      throw new TransportError('closed', 'Not connected')
    }
    return this.transport
  }

  /**
   * Write a set command. Set commands are not acknowledged by the instrument.
   * @param command
   * @param apply - 'optimistic' marks the fields pending, 'assumed' does not,
   *   'none' leaves the snapshot alone (queued commands were applied already)
   */
  private async sendCommand(command: ScpiSetCommand, apply: CommandApplication = 'optimistic'): Promise<void> {
    const transport = this.requireTransport()
    if (apply !== 'none') {
      this.machine.applyCommand(command, apply === 'optimistic')
    }
    await transport.write(encode(command))
    log.debug(`[MultimeterPoller] Sent ${formatCommand(command)}`)
  }

  /**
   * Issue a query and wait for its answer. Frames that don't answer it are dropped.
   * @param query
   * @returns The parsed update, or null on timeout
   * @throws DeviceUnresponsiveError when the timeout limit is reached
   * @throws TransportError on I/O failure or abort
   */
  private async query(query: ScpiQuery): Promise<ParsedUpdate | null> {
    const transport = this.requireTransport()
    const signal = this.abortController?.signal

    for (const stray of transport.drain()) {
      log.debug(`[MultimeterPoller] Dropped stray line ${JSON.stringify(stray)}`)
    }

    this.outstanding = query
    try {
      await transport.write(encode(query))

      const deadline = performance.now() + this.config.readTimeoutMs
      for (;;) {
        const remaining = Math.max(0, deadline - performance.now())
        const result = await transport.readLine(remaining, signal)
        if (result.kind === 'timeout') {
          this.handleTimeout(query, result.partial)
          return null
        }

        let token: RawToken
        try {
          token = decode(result.bytes, query)
        } catch (error) {
          if (error instanceof DecodeError) {
            log.warn(`[MultimeterPoller] Dropped ${error.kind} frame: ${error.message}`)
            continue
          }
          throw error
        }

        this.consecutiveTimeouts = 0
        return this.applyUpdate(parse(token, this.machine.snapshot, this.parseOptions()))
      }
    } finally {
      this.outstanding = null
    }
  }

  /**
   *
   * @param query
   * @param partial
   */
  private handleTimeout(query: ScpiQuery, partial: Buffer): void {
    if (partial.length > 0) {
      log.warn(`[MultimeterPoller] Dropped truncated frame ${JSON.stringify(partial.toString('latin1'))}`)
    }

    this.consecutiveTimeouts++
    log.warn(
      `[MultimeterPoller] Timeout waiting for ${formatCommand(query)} ` +
        `(${this.consecutiveTimeouts}/${this.config.maxConsecutiveTimeouts})`
    )

    if (this.consecutiveTimeouts >= this.config.maxConsecutiveTimeouts) {
      throw new DeviceUnresponsiveError(
        `No response after ${this.consecutiveTimeouts} consecutive queries`,
        this.consecutiveTimeouts
      )
    }
  }

  /**
   *
   */
  private parseOptions(): ParseOptions {
    return { unknownFirmwarePolicy: this.config.unknownFirmwarePolicy }
  }

  /**
   * Merge a parsed response into the device state and fan out its side effects.
   * @param update
   */
  private applyUpdate(update: ParsedUpdate): ParsedUpdate {
    for (const error of update.errors) {
      log.warn(`[MultimeterPoller] ${error.message}`)
      this.emit('warning', error)
    }
    for (const warning of update.warnings) {
      log.warn(`[MultimeterPoller] ${warning.message}`)
      this.emit('warning', warning)
    }

    const previousMode = this.machine.snapshot.mode
    const corrections = this.machine.applyReadback(update)
    for (const correction of corrections) {
      this.emitCorrection(correction)
    }

    if (update.fields.quirk) {
      log.info(`[MultimeterPoller] Diode/continuity mapping: ${update.fields.quirk.policy} (${update.fields.quirk.reason})`)
    }

    if (update.measurement) {
      this.handleMeasurement(update.measurement)
    }

    const mode = update.fields.mode
    if ((mode === 'continuity' || mode === 'diode') && mode !== previousMode && this.machine.state === 'ready') {
      log.info(`[MultimeterPoller] Mode changed to ${mode} on the instrument, re-asserting beeper and threshold`)
      this.reassertThresholdSettings(mode)
    }

    return update
  }

  /**
   *
   * @param measurement
   */
  private handleMeasurement(measurement: Measurement): void {
    this.latestMeasurement = measurement
    this.lastMeasurementAt = performance.now()
    this.measurementsReceived++
    this.emit('measurement', measurement)
    this.recording?.offer(measurement)
  }

  /**
   *
   * @param reason
   */
  private async teardown(reason?: string): Promise<void> {
    log.info(`[MultimeterPoller] Disconnecting${reason ? ` (${reason})` : ''}...`)

    this.stopTimers()
    this.abortController?.abort()
    this.abortController = null

    if (this.inFlight) {
      await this.inFlight
    }

    const transport = this.transport
    this.transport = null
    if (transport) {
      if (this.machine.snapshot.remoteLock && transport.isOpen) {
        try {
          await transport.write(encode({ type: 'setRemoteLock', locked: false }))
        } catch (error) {
          log.warn('[MultimeterPoller] Failed to release remote lock:', error)
        }
      }
      try {
        await transport.close()
      } catch (error) {
        log.error('[MultimeterPoller] Error closing port:', error)
      }
    }

    this.commandQueue = []
    this.outstanding = null
    this.consecutiveTimeouts = 0
    this.measurementsSinceFunction = 0
    this.latestMeasurement = null
    this.lastMeasurementAt = null

    this.machine.transition('disconnected', reason)
    this.emitStateChange()
    log.info('[MultimeterPoller] Disconnected')
  }

  // ========================================================================
  // Internal Helpers: Events
  // ========================================================================

  /**
   *
   */
  private emitRefresh(): void {
    const frame: RefreshFrame = { snapshot: this.machine.snapshot, measurement: this.latestMeasurement }
    this.emit('refresh', frame)
  }

  /**
   *
   * @param correction
   */
  private emitCorrection(correction: Correction): void {
    log.info(
      `[MultimeterPoller] Readback corrected ${correction.field}: ${correction.optimistic} -> ${correction.readback}`
    )
    this.emit('correction', correction)
  }

  /**
   *
   * @param error
   */
  private emitError(error: Error): void {
    log.error(`[MultimeterPoller] ${error.name}: ${error.message}`)
    if (this.listenerCount('error') > 0) {
      this.emit('error', error)
    }
  }

  /**
   *
   */
  private emitStateChange(): void {
    this.emit('state-change', this.machine.state)
  }
}
