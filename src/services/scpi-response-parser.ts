/**
 * SCPI Response Parser
 *
 * Maps decoded tokens to domain values. Parsing is pure: the result depends only
 * on the token, the snapshot it is parsed against and the options passed in.
 * A field that fails validation is reported as a ParseError and left out of the
 * update; the rest of the update still applies.
 */

import { performance } from 'perf_hooks'

import type {
  DeviceIdentity,
  DeviceSnapshot,
  Measurement,
  MeasurementMode,
  MeasurementTimestamp,
  MeasurementUnit,
  QuirkDecision,
  RangeSetting,
  SyncField,
  UnknownFirmwarePolicy,
} from '../types/multimeter'
import { QuirkAmbiguousError, remapPolicyFor, resolveMode } from './firmware-quirks'
import { FUNCTION_IDENTIFIERS, matchRangeReadback, rangeOptionsFor, type RawToken, RE_NUMERIC_FRAME } from './scpi-protocol'

// ============================================================================
// Constants
// ============================================================================

/** Open-circuit / overload code reported by OWON XDM meters */
export const OWON_OVERFLOW_CODE = 1e9

/** Standard SCPI overflow value (9.9E37 and above) */
export const SCPI_OVERFLOW_CODE = 9.9e37

const MODE_UNITS: Record<MeasurementMode, MeasurementUnit> = {
  dcv: 'V',
  acv: 'V',
  dci: 'A',
  aci: 'A',
  resistance2w: 'Ω',
  resistance4w: 'Ω',
  capacitance: 'F',
  frequency: 'Hz',
  period: 's',
  continuity: 'Ω',
  diode: 'V',
  temperature: '°C',
  dutyCycle: '%',
  diodeContinuityAmbiguous: 'Ω',
}

// ============================================================================
// Type Definitions
// ============================================================================

export type ParsedField = 'identity' | 'measurement' | 'mode' | 'range' | 'beeper' | 'threshold'

/**
 * Snapshot values carried by a single response.
 */
export interface SnapshotPatch {
  identity?: DeviceIdentity
  firmwareVersion?: string
  quirk?: QuirkDecision
  mode?: MeasurementMode
  range?: RangeSetting
  beeperEnabled?: boolean
  continuityThreshold?: number
  diodeThreshold?: number
}

export interface ParsedUpdate {
  fields: SnapshotPatch
  /** Sync fields this response confirms */
  confirms: SyncField[]
  measurement?: Measurement
  errors: ParseError[]
  warnings: QuirkAmbiguousError[]
}

export interface ParseOptions {
  unknownFirmwarePolicy: UnknownFirmwarePolicy
  clock?: () => MeasurementTimestamp
}

// ============================================================================
// Custom Errors
// ============================================================================

/**
 *
 */
export class ParseError extends Error {
  readonly field: ParsedField
  readonly raw: string

  /**
   *
   * @param field
   * @param raw
   * @param message
   */
  constructor(field: ParsedField, raw: string, message: string) {
    super(message)
    this.name = 'ParseError'
    this.field = field
    this.raw = raw
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 *
 * @param mode
 */
export function unitForMode(mode: MeasurementMode): MeasurementUnit {
  return MODE_UNITS[mode]
}

/**
 *
 * @param value
 */
export function isOverflowCode(value: number): boolean {
  const magnitude = Math.abs(value)
  return magnitude === OWON_OVERFLOW_CODE || magnitude >= SCPI_OVERFLOW_CODE
}

/**
 * Wall clock plus monotonic timestamp for a new measurement.
 */
export function currentTimestamp(): MeasurementTimestamp {
  return {
    wallClock: new Date().toISOString(),
    monotonicMs: performance.now(),
  }
}

/**
 *
 * @param raw
 */
function parseBoolean(raw: string): boolean {
  const upper = raw.toUpperCase()
  return upper === 'ON' || upper === '1'
}

/**
 *
 * @param raw
 */
function parseNumber(raw: string): number | null {
  if (!RE_NUMERIC_FRAME.test(raw)) {
    return null
  }
  const value = parseFloat(raw)
  return Number.isFinite(value) ? value : null
}

// ============================================================================
// Parser
// ============================================================================

/**
 * Map a decoded token to a snapshot patch and, for MEAS?, a measurement.
 * @param token - Decoded response
 * @param snapshot - Snapshot the response is interpreted against
 * @param options - Unknown-firmware fail-safe and clock
 */
export function parse(token: RawToken, snapshot: DeviceSnapshot, options: ParseOptions): ParsedUpdate {
  const update: ParsedUpdate = { fields: {}, confirms: [], errors: [], warnings: [] }
  const [first = ''] = token.fields

  switch (token.query.type) {
    case 'identify':
      parseIdentity(token, update, options)
      break
    case 'measure':
      parseMeasurement(first, snapshot, update, options)
      break
    case 'queryFunction':
      parseFunction(first, snapshot, update, options)
      break
    case 'queryRange':
      parseRange(first, snapshot, update)
      break
    case 'queryAutoRange':
      parseAutoRange(first, snapshot, update)
      break
    case 'queryBeeper':
      update.fields.beeperEnabled = parseBoolean(first)
      update.confirms.push('beeper')
      break
    case 'queryThreshold': {
      const value = parseNumber(first)
      if (value === null || value < 0) {
        update.errors.push(new ParseError('threshold', first, `Invalid ${token.query.threshold} threshold: ${first}`))
        break
      }
      if (token.query.threshold === 'continuity') {
        update.fields.continuityThreshold = value
        update.confirms.push('continuityThreshold')
      } else {
        update.fields.diodeThreshold = value
        update.confirms.push('diodeThreshold')
      }
      break
    }
  }

  return update
}

/**
 *
 * @param token
 * @param update
 * @param options
 */
function parseIdentity(token: RawToken, update: ParsedUpdate, options: ParseOptions): void {
  const [manufacturer, model, serialNumber, firmware] = token.fields
  if (!manufacturer || !model || firmware === undefined) {
    update.errors.push(new ParseError('identity', token.raw, `Incomplete identity: ${token.raw}`))
    return
  }

  const identity: DeviceIdentity = {
    manufacturer,
    model,
    serialNumber: serialNumber ?? '',
    firmware,
  }
  const quirk = remapPolicyFor(identity, options.unknownFirmwarePolicy)

  update.fields.identity = identity
  update.fields.firmwareVersion = firmware
  update.fields.quirk = quirk
  update.confirms.push('identity')

  if (quirk.firmwareUnknown) {
    update.warnings.push(new QuirkAmbiguousError(firmware, quirk.policy))
  }
}

/**
 *
 * @param raw
 * @param snapshot
 * @param update
 * @param options
 */
function parseMeasurement(raw: string, snapshot: DeviceSnapshot, update: ParsedUpdate, options: ParseOptions): void {
  if (!snapshot.mode) {
    update.errors.push(new ParseError('measurement', raw, 'Measurement received before the mode is known'))
    return
  }

  const value = parseNumber(raw)
  if (value === null) {
    update.errors.push(new ParseError('measurement', raw, `Invalid measurement value: ${raw}`))
    return
  }

  const clock = options.clock ?? currentTimestamp
  const measurement: Measurement = {
    value: isOverflowCode(value) ? { kind: 'overflow' } : { kind: 'numeric', value },
    unit: unitForMode(snapshot.mode),
    mode: snapshot.mode,
    range: snapshot.range ?? { kind: 'auto' },
    timestamp: clock(),
  }
  update.measurement = Object.freeze(measurement)
}

/**
 *
 * @param raw
 * @param snapshot
 * @param update
 * @param options
 */
function parseFunction(raw: string, snapshot: DeviceSnapshot, update: ParsedUpdate, options: ParseOptions): void {
  const wireMode = FUNCTION_IDENTIFIERS[raw.toUpperCase()]
  if (!wireMode) {
    update.errors.push(new ParseError('mode', raw, `Unknown function identifier: ${raw}`))
    return
  }

  const policy = snapshot.quirk?.policy ?? remapPolicyFor(null, options.unknownFirmwarePolicy).policy
  update.fields.mode = resolveMode(wireMode, policy)
  update.confirms.push('mode')
}

/**
 *
 * @param raw
 * @param snapshot
 * @param update
 */
function parseRange(raw: string, snapshot: DeviceSnapshot, update: ParsedUpdate): void {
  if (!snapshot.mode) {
    update.errors.push(new ParseError('range', raw, 'Range received before the mode is known'))
    return
  }

  // Modes without selectable ranges are always reported as auto
  if (rangeOptionsFor(snapshot.mode).length === 0) {
    update.fields.range = { kind: 'auto' }
    update.confirms.push('range')
    return
  }

  // Ranges missing from the table are kept as the instrument reported them
  const option = matchRangeReadback(snapshot.mode, raw)
  if (!option) {
    update.errors.push(new ParseError('range', raw, `Range ${raw} is not in the table for mode ${snapshot.mode}`))
  }

  update.fields.range = option ? { kind: 'fixed', label: option.label, scpi: option.scpi } : { kind: 'fixed', label: raw, scpi: raw }
  update.confirms.push('range')
}

/**
 *
 * @param raw
 * @param snapshot
 * @param update
 */
function parseAutoRange(raw: string, snapshot: DeviceSnapshot, update: ParsedUpdate): void {
  const rangeless = snapshot.mode !== null && rangeOptionsFor(snapshot.mode).length === 0
  if (parseBoolean(raw) || rangeless) {
    update.fields.range = { kind: 'auto' }
    update.confirms.push('range')
    return
  }

  // Auto-ranging off: the fixed range must already be known from RANGE?
  if (snapshot.range?.kind === 'fixed') {
    update.fields.range = snapshot.range
    update.confirms.push('range')
    return
  }

  update.errors.push(new ParseError('range', raw, 'Auto-range is off but no fixed range is known'))
}
