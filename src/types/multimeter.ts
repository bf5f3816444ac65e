/**
 * Shared multimeter type definitions.
 *
 * These types describe what the host knows about the instrument: the measurement
 * modes it can be in, the values it reports and the snapshot the device state
 * machine publishes to UI and recording consumers.
 */

/**
 * Measurement function of the instrument.
 * - 'diodeContinuityAmbiguous': a diode/continuity readback whose meaning cannot be
 *   resolved because the firmware revision is unknown and the configured fail-safe
 *   is to report the ambiguity instead of guessing.
 */
export type MeasurementMode =
  | 'dcv'
  | 'acv'
  | 'dci'
  | 'aci'
  | 'resistance2w'
  | 'resistance4w'
  | 'capacitance'
  | 'frequency'
  | 'period'
  | 'continuity'
  | 'diode'
  | 'temperature'
  | 'dutyCycle'
  | 'diodeContinuityAmbiguous'

export type MeasurementUnit = 'V' | 'A' | 'Ω' | 'F' | 'Hz' | 's' | '°C' | '°F' | 'dB' | '%'

/**
 * A reported value. Out-of-range readings carry no number at all so that an
 * overload code can never be plotted or recorded as a real reading.
 */
export type MeasurementValue = { kind: 'numeric'; value: number } | { kind: 'overflow' }

export type RangeSetting = { kind: 'auto' } | { kind: 'fixed'; label: string; scpi: string }

export type SampleRate = 'slow' | 'medium' | 'fast'

export type ThresholdKind = 'continuity' | 'diode'

export interface MeasurementTimestamp {
  /** ISO 8601 wall clock */
  wallClock: string
  /** Monotonic clock in milliseconds (performance.now()) */
  monotonicMs: number
}

export interface Measurement {
  value: MeasurementValue
  unit: MeasurementUnit
  mode: MeasurementMode
  range: RangeSetting
  timestamp: MeasurementTimestamp
}

/**
 * Parsed *IDN? response, e.g. "OWON,XDM1041,2110166,V4.3.0,2".
 */
export interface DeviceIdentity {
  manufacturer: string
  model: string
  serialNumber: string
  firmware: string
}

export interface FirmwareVersion {
  major: number
  minor: number
  patch: number
}

/**
 * How MODE readbacks for diode and continuity are interpreted.
 * - 'swap': firmware reports the two identifiers swapped
 * - 'passthrough': identifiers mean what they say
 * - 'ambiguous': both identifiers map to 'diodeContinuityAmbiguous'
 */
export type RemapPolicy = 'swap' | 'passthrough' | 'ambiguous'

/**
 * What to assume when the firmware revision cannot be determined.
 */
export type UnknownFirmwarePolicy = 'assume-quirk' | 'assume-fixed' | 'report-ambiguous'

export interface QuirkDecision {
  policy: RemapPolicy
  /** Human readable explanation, logged at connect time */
  reason: string
  /** True when the decision came from the unknown-firmware fail-safe */
  firmwareUnknown: boolean
}

export type ConnectionState = 'disconnected' | 'connecting' | 'syncing' | 'ready'

/**
 * Snapshot fields that must be confirmed by a readback before the device is ready.
 */
export type SyncField = 'identity' | 'mode' | 'range' | 'beeper' | 'continuityThreshold' | 'diodeThreshold'

/**
 * Fields a host command can change optimistically.
 */
export type CommandField = 'mode' | 'range' | 'beeper' | 'continuityThreshold' | 'diodeThreshold' | 'rate' | 'remoteLock'

export interface DeviceSnapshot {
  connection: ConnectionState
  mode: MeasurementMode | null
  range: RangeSetting | null
  beeperEnabled: boolean | null
  continuityThreshold: number | null
  diodeThreshold: number | null
  /** Remote lock as requested by the host; enforced by the instrument */
  remoteLock: boolean
  rate: SampleRate | null
  identity: DeviceIdentity | null
  firmwareVersion: string | null
  quirk: QuirkDecision | null
  /** Fields that have had at least one authoritative readback */
  confirmed: readonly SyncField[]
  /** Fields changed by a host command and not yet confirmed */
  pending: readonly CommandField[]
  lastError: string | null
  /** Incremented on every published change */
  revision: number
}

/**
 * Health/status data for a connected instrument.
 */
export interface MultimeterHealth {
  connection: ConnectionState
  port: string | null
  model: string | null
  firmware: string | null
  consecutiveTimeouts: number
  outstandingQuery: string | null
  queuedCommands: number
  measurementsReceived: number
  lastMeasurementAgeMs?: number
  lastError: string | null
}

/**
 * Structured record handed to external writers (CSV, spreadsheet, JSON).
 */
export interface RecordingRecord {
  index: number
  timestamp: string
  monotonicMs: number
  mode: MeasurementMode
  range: string
  value: number | null
  overflow: boolean
  unit: MeasurementUnit
}

export type RecordingMode = 'continuous' | 'fixed-interval' | 'manual'

/** RFC 3339 wall-clock time, or Unix seconds with millisecond fraction */
export type TimestampFormat = 'rfc3339' | 'unix'

/**
 * Latest state published on the UI refresh cadence.
 */
export interface RefreshFrame {
  snapshot: DeviceSnapshot
  measurement: Measurement | null
}
