// * Multimeter Configuration
// * Immutable settings shared by the poller, recording session and UI store.
// * createMultimeterConfig() is the only way to build one: every value is validated, the result is frozen.

import type { SampleRate, UnknownFirmwarePolicy } from '../types/multimeter'
import { DEFAULT_BAUD_RATE } from './scpi-protocol'

// ============================================================================
// Type Definitions
// ============================================================================

export interface MultimeterConfig {
  /** Interval between MEAS? queries once the device is ready */
  readonly pollIntervalMs: number
  /** Interval between 'refresh' frames handed to the UI */
  readonly uiRefreshIntervalMs: number
  /** Upper bound on the wait for a single query response */
  readonly readTimeoutMs: number
  /** Consecutive timeouts that declare the device unresponsive */
  readonly maxConsecutiveTimeouts: number
  /** Send SYST:REM after sync and SYST:LOC on disconnect */
  readonly lockRemoteOnConnect: boolean
  /** Depth of the rolling measurement buffer (graph and recording) */
  readonly bufferDepth: number
  /** A FUNC? readback is interleaved after this many measurements */
  readonly functionPollEvery: number
  readonly unknownFirmwarePolicy: UnknownFirmwarePolicy
  /** Sample rate sent after sync */
  readonly sampleRate: SampleRate
  /** Beeper state sent after sync and re-asserted on entering continuity or diode mode */
  readonly beeperEnabled: boolean
  /** Continuity threshold in Ω */
  readonly continuityThreshold: number
  /** Diode threshold in V */
  readonly diodeThreshold: number
  readonly baudRate: number
}

// ============================================================================
// Constants
// ============================================================================

export const MAX_BUFFER_DEPTH = 2000

export const VALID_BAUD_RATES: ReadonlySet<number> = new Set([9600, 19200, 38400, 57600, 115200])

export const UNKNOWN_FIRMWARE_POLICIES: readonly UnknownFirmwarePolicy[] = [
  'assume-quirk',
  'assume-fixed',
  'report-ambiguous',
]

export const SAMPLE_RATES: readonly SampleRate[] = ['slow', 'medium', 'fast']

export const DEFAULT_CONFIG: MultimeterConfig = Object.freeze({
  pollIntervalMs: 20,
  uiRefreshIntervalMs: 20,
  readTimeoutMs: 500,
  maxConsecutiveTimeouts: 3,
  lockRemoteOnConnect: false,
  bufferDepth: 100,
  functionPollEvery: 10,
  unknownFirmwarePolicy: 'assume-quirk',
  sampleRate: 'slow',
  beeperEnabled: true,
  continuityThreshold: 50,
  diodeThreshold: 2,
  baudRate: DEFAULT_BAUD_RATE,
})

// ============================================================================
// Custom Errors
// ============================================================================

/**
 *
 */
export class InvalidConfigValueError extends Error {
  readonly key: string

  /**
   *
   * @param key
   * @param message
   */
  constructor(key: string, message: string) {
    super(message)
    this.name = 'InvalidConfigValueError'
    this.key = key
  }
}

// ============================================================================
// Validation
// ============================================================================

/**
 *
 * @param key
 * @param value
 * @param min
 * @param max
 */
export function validateInteger(key: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    const bound = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `${min}-${max}`
    throw new InvalidConfigValueError(key, `${key} must be an integer ${bound}, got ${value}`)
  }
  return value
}

/**
 *
 * @param key
 * @param value
 */
function validateThreshold(key: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidConfigValueError(key, `${key} must be a non-negative number, got ${value}`)
  }
  return value
}

/**
 *
 * @param key
 * @param value
 */
function validateBoolean(key: string, value: boolean): boolean {
  if (typeof value !== 'boolean') {
    throw new InvalidConfigValueError(key, `${key} must be a boolean, got ${String(value)}`)
  }
  return value
}

/**
 *
 * @param value
 */
function validatePolicy(value: string): UnknownFirmwarePolicy {
  const policy = UNKNOWN_FIRMWARE_POLICIES.find((candidate) => candidate === value)
  if (!policy) {
    throw new InvalidConfigValueError(
      'unknownFirmwarePolicy',
      `unknownFirmwarePolicy must be one of ${UNKNOWN_FIRMWARE_POLICIES.join(', ')}, got '${value}'`
    )
  }
  return policy
}

/**
 *
 * @param value
 */
function validateSampleRate(value: string): SampleRate {
  const rate = SAMPLE_RATES.find((candidate) => candidate === value)
  if (!rate) {
    throw new InvalidConfigValueError('sampleRate', `sampleRate must be one of ${SAMPLE_RATES.join(', ')}, got '${value}'`)
  }
  return rate
}

/**
 * Build a validated, frozen configuration.
 * @param overrides - Values replacing the defaults; undefined entries are ignored
 * @throws InvalidConfigValueError naming the first invalid key
 */
export function createMultimeterConfig(overrides: Partial<MultimeterConfig> = {}): MultimeterConfig {
  const baudRate = overrides.baudRate ?? DEFAULT_CONFIG.baudRate
  if (!VALID_BAUD_RATES.has(baudRate)) {
    throw new InvalidConfigValueError(
      'baudRate',
      `baudRate must be one of ${Array.from(VALID_BAUD_RATES).join(', ')}, got ${baudRate}`
    )
  }

  return Object.freeze({
    pollIntervalMs: validateInteger('pollIntervalMs', overrides.pollIntervalMs ?? DEFAULT_CONFIG.pollIntervalMs, 1),
    uiRefreshIntervalMs: validateInteger(
      'uiRefreshIntervalMs',
      overrides.uiRefreshIntervalMs ?? DEFAULT_CONFIG.uiRefreshIntervalMs,
      1
    ),
    readTimeoutMs: validateInteger('readTimeoutMs', overrides.readTimeoutMs ?? DEFAULT_CONFIG.readTimeoutMs, 1),
    maxConsecutiveTimeouts: validateInteger(
      'maxConsecutiveTimeouts',
      overrides.maxConsecutiveTimeouts ?? DEFAULT_CONFIG.maxConsecutiveTimeouts,
      1
    ),
    lockRemoteOnConnect: validateBoolean(
      'lockRemoteOnConnect',
      overrides.lockRemoteOnConnect ?? DEFAULT_CONFIG.lockRemoteOnConnect
    ),
    bufferDepth: validateInteger('bufferDepth', overrides.bufferDepth ?? DEFAULT_CONFIG.bufferDepth, 1, MAX_BUFFER_DEPTH),
    functionPollEvery: validateInteger(
      'functionPollEvery',
      overrides.functionPollEvery ?? DEFAULT_CONFIG.functionPollEvery,
      1
    ),
    unknownFirmwarePolicy: validatePolicy(overrides.unknownFirmwarePolicy ?? DEFAULT_CONFIG.unknownFirmwarePolicy),
    sampleRate: validateSampleRate(overrides.sampleRate ?? DEFAULT_CONFIG.sampleRate),
    beeperEnabled: validateBoolean('beeperEnabled', overrides.beeperEnabled ?? DEFAULT_CONFIG.beeperEnabled),
    continuityThreshold: validateThreshold(
      'continuityThreshold',
      overrides.continuityThreshold ?? DEFAULT_CONFIG.continuityThreshold
    ),
    diodeThreshold: validateThreshold('diodeThreshold', overrides.diodeThreshold ?? DEFAULT_CONFIG.diodeThreshold),
    baudRate,
  })
}
