// * Firmware Quirk Resolver
// * Some OWON XDM firmware revisions report the FUNC? identifiers for continuity and diode swapped.
// * The table below is the single place that knows which models and revisions are affected.

import type {
  DeviceIdentity,
  FirmwareVersion,
  MeasurementMode,
  QuirkDecision,
  RemapPolicy,
  UnknownFirmwarePolicy,
} from '../types/multimeter'

// ============================================================================
// Quirk Table
// ============================================================================

/**
 *
 */
interface ModeSwapQuirk {
  /** Models (second *IDN? field) known to carry the swap */
  models: readonly string[]
  /** First firmware revision that reports the identifiers correctly */
  fixedIn: FirmwareVersion
}

export const DIODE_CONTINUITY_SWAP: ModeSwapQuirk = {
  models: ['XDM1041', 'XDM1241'],
  fixedIn: { major: 4, minor: 3, patch: 0 },
}

const RE_FIRMWARE_VERSION = /^v?(\d+)\.(\d+)\.(\d+)/i

// ============================================================================
// Custom Errors
// ============================================================================

/**
 * Raised (as a warning, never thrown at the caller) when the firmware revision
 * cannot be determined and the configured fail-safe had to be applied.
 */
export class QuirkAmbiguousError extends Error {
  readonly firmware: string | null
  readonly policy: RemapPolicy

  /**
   *
   * @param firmware
   * @param policy
   */
  constructor(firmware: string | null, policy: RemapPolicy) {
    super(`Firmware version '${firmware ?? 'unknown'}' could not be parsed; diode/continuity policy: ${policy}`)
    this.name = 'QuirkAmbiguousError'
    this.firmware = firmware
    this.policy = policy
  }
}

// ============================================================================
// Version Handling
// ============================================================================

/**
 * Parse a firmware string such as "V4.3.0" or "4.2.1".
 * @param raw
 * @returns Version triple, or null if the string has fewer than three numeric parts
 */
export function parseFirmwareVersion(raw: string | null | undefined): FirmwareVersion | null {
  if (!raw) {
    return null
  }
  const match = RE_FIRMWARE_VERSION.exec(raw.trim())
  if (!match) {
    return null
  }
  return {
    major: parseInt(match[1], 10),
    minor: parseInt(match[2], 10),
    patch: parseInt(match[3], 10),
  }
}

/**
 *
 * @param a
 * @param b
 */
export function compareFirmwareVersions(a: FirmwareVersion, b: FirmwareVersion): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch
}

/**
 *
 * @param version
 */
export function formatFirmwareVersion(version: FirmwareVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`
}

// ============================================================================
// Policy Resolution
// ============================================================================

const FAIL_SAFE_POLICIES: Record<UnknownFirmwarePolicy, RemapPolicy> = {
  'assume-quirk': 'swap',
  'assume-fixed': 'passthrough',
  'report-ambiguous': 'ambiguous',
}

/**
 * Decide how diode/continuity readbacks are interpreted for a connected instrument.
 *
 * Models outside the quirk table pass identifiers through when their firmware
 * parses. An unparseable or missing firmware string always takes the configured
 * fail-safe, whatever the model.
 * @param identity - Parsed *IDN? response, or null if it was never received
 * @param unknownFirmwarePolicy - Fail-safe for unknown firmware
 */
export function remapPolicyFor(
  identity: DeviceIdentity | null,
  unknownFirmwarePolicy: UnknownFirmwarePolicy
): QuirkDecision {
  const version = parseFirmwareVersion(identity?.firmware)

  if (!identity || !version) {
    const policy = FAIL_SAFE_POLICIES[unknownFirmwarePolicy]
    return {
      policy,
      reason: `firmware '${identity?.firmware ?? 'unknown'}' unparseable, fail-safe '${unknownFirmwarePolicy}'`,
      firmwareUnknown: true,
    }
  }

  const model = identity.model.toUpperCase()
  if (!DIODE_CONTINUITY_SWAP.models.includes(model)) {
    return {
      policy: 'passthrough',
      reason: `model ${model} not affected by diode/continuity swap`,
      firmwareUnknown: false,
    }
  }

  const fixedIn = DIODE_CONTINUITY_SWAP.fixedIn
  if (compareFirmwareVersions(version, fixedIn) < 0) {
    return {
      policy: 'swap',
      reason: `${model} firmware ${formatFirmwareVersion(version)} < ${formatFirmwareVersion(fixedIn)} swaps CONT/DIOD`,
      firmwareUnknown: false,
    }
  }

  return {
    policy: 'passthrough',
    reason: `${model} firmware ${formatFirmwareVersion(version)} >= ${formatFirmwareVersion(fixedIn)}`,
    firmwareUnknown: false,
  }
}

/**
 * Map a wire-level mode to the semantic mode under a remap policy. Only diode
 * and continuity are affected.
 * @param wireMode
 * @param policy
 */
export function resolveMode(wireMode: MeasurementMode, policy: RemapPolicy): MeasurementMode {
  if (wireMode !== 'diode' && wireMode !== 'continuity') {
    return wireMode
  }

  switch (policy) {
    case 'swap':
      return wireMode === 'diode' ? 'continuity' : 'diode'
    case 'ambiguous':
      return 'diodeContinuityAmbiguous'
    case 'passthrough':
      return wireMode
  }
}
