// * Device State Machine
// * Authoritative model of what the instrument is doing. Two update streams are merged here:
// * host commands (applied optimistically) and readbacks (authoritative, readback wins).
// * All reducers are pure: (snapshot, input) -> new frozen snapshot.
// ! Single writer: only the poller that owns the serial transport calls the mutating methods.

import type {
  CommandField,
  ConnectionState,
  DeviceSnapshot,
  RangeSetting,
  SyncField,
} from '../types/multimeter'
import log from './logger'
import type { ScpiSetCommand } from './scpi-protocol'
import type { ParsedUpdate, SnapshotPatch } from './scpi-response-parser'

// ============================================================================
// Constants
// ============================================================================

export const SYNC_FIELDS: readonly SyncField[] = [
  'identity',
  'mode',
  'range',
  'beeper',
  'continuityThreshold',
  'diodeThreshold',
]

const ALLOWED_TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  disconnected: ['connecting'],
  connecting: ['syncing', 'disconnected'],
  syncing: ['ready', 'disconnected'],
  ready: ['disconnected'],
}

/** Snapshot keys a readback can carry for fields a host command may have set */
const PATCH_COMMAND_FIELDS: readonly (readonly [keyof SnapshotPatch, CommandField])[] = [
  ['mode', 'mode'],
  ['range', 'range'],
  ['beeperEnabled', 'beeper'],
  ['continuityThreshold', 'continuityThreshold'],
  ['diodeThreshold', 'diodeThreshold'],
]

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * An optimistic value that a readback overwrote.
 */
export interface Correction {
  field: CommandField
  optimistic: string
  readback: string
}

export interface ReadbackResult {
  snapshot: DeviceSnapshot
  corrections: Correction[]
}

// ============================================================================
// Custom Errors
// ============================================================================

/**
 *
 */
export class InvalidTransitionError extends Error {
  /**
   *
   * @param from
   * @param to
   */
  constructor(from: ConnectionState, to: ConnectionState) {
    super(`Invalid device state transition: ${from} -> ${to}`)
    this.name = 'InvalidTransitionError'
  }
}

// ============================================================================
// Pure Reducers
// ============================================================================

/**
 *
 * @param snapshot
 */
function freezeSnapshot(snapshot: DeviceSnapshot): DeviceSnapshot {
  Object.freeze(snapshot.confirmed)
  Object.freeze(snapshot.pending)
  if (snapshot.range) Object.freeze(snapshot.range)
  if (snapshot.identity) Object.freeze(snapshot.identity)
  if (snapshot.quirk) Object.freeze(snapshot.quirk)
  return Object.freeze(snapshot)
}

/**
 *
 * @param snapshot
 * @param changes
 */
function nextSnapshot(snapshot: DeviceSnapshot, changes: Partial<DeviceSnapshot>): DeviceSnapshot {
  return freezeSnapshot({ ...snapshot, ...changes, revision: snapshot.revision + 1 })
}

/**
 * A blank, disconnected snapshot.
 * @param lastError - Error description kept across the disconnect for display
 * @param revision
 */
export function createInitialSnapshot(lastError: string | null = null, revision = 0): DeviceSnapshot {
  return freezeSnapshot({
    connection: 'disconnected',
    mode: null,
    range: null,
    beeperEnabled: null,
    continuityThreshold: null,
    diodeThreshold: null,
    remoteLock: false,
    rate: null,
    identity: null,
    firmwareVersion: null,
    quirk: null,
    confirmed: [],
    pending: [],
    lastError,
    revision,
  })
}

/**
 * Move to another connection state. Entering 'disconnected' clears everything
 * except the last error; entering 'connecting' starts from a blank snapshot.
 * @param snapshot
 * @param to
 * @param lastError
 * @throws InvalidTransitionError
 */
export function transition(snapshot: DeviceSnapshot, to: ConnectionState, lastError?: string): DeviceSnapshot {
  if (!ALLOWED_TRANSITIONS[snapshot.connection].includes(to)) {
    throw new InvalidTransitionError(snapshot.connection, to)
  }

  if (to === 'disconnected') {
    return createInitialSnapshot(lastError ?? snapshot.lastError, snapshot.revision + 1)
  }

  if (to === 'connecting') {
    return nextSnapshot(createInitialSnapshot(null, snapshot.revision), { connection: 'connecting' })
  }

  return nextSnapshot(snapshot, { connection: to })
}

/**
 *
 * @param pending
 * @param fields
 */
function addPending(pending: readonly CommandField[], fields: CommandField[]): CommandField[] {
  return [...pending, ...fields.filter((field) => !pending.includes(field))]
}

/**
 * Apply a host command optimistically. The changed fields stay pending until a
 * readback confirms or corrects them.
 * @param snapshot
 * @param command
 * @param markPending - False for values taken as set without a readback to come
 */
export function applyCommand(snapshot: DeviceSnapshot, command: ScpiSetCommand, markPending = true): DeviceSnapshot {
  const withPending = (fields: CommandField[]): CommandField[] =>
    markPending ? addPending(snapshot.pending, fields) : [...snapshot.pending]

  switch (command.type) {
    case 'configure': {
      const range: RangeSetting = command.range ?? { kind: 'auto' }
      return nextSnapshot(snapshot, {
        mode: command.mode,
        range,
        pending: withPending(['mode', 'range']),
      })
    }
    case 'setRate':
      return nextSnapshot(snapshot, { rate: command.rate, pending: withPending(['rate']) })
    case 'setBeeper':
      return nextSnapshot(snapshot, {
        beeperEnabled: command.enabled,
        pending: withPending(['beeper']),
      })
    case 'setRemoteLock':
      return nextSnapshot(snapshot, {
        remoteLock: command.locked,
        pending: withPending(['remoteLock']),
      })
    case 'setThreshold':
      if (command.threshold === 'continuity') {
        return nextSnapshot(snapshot, {
          continuityThreshold: command.value,
          pending: withPending(['continuityThreshold']),
        })
      }
      return nextSnapshot(snapshot, {
        diodeThreshold: command.value,
        pending: withPending(['diodeThreshold']),
      })
    case 'reset':
      return snapshot
  }
}

/**
 *
 * @param value
 */
function describeValue(value: unknown): string {
  if (value === null || value === undefined) {
    return 'unknown'
  }
  if (typeof value === 'object') {
    return JSON.stringify(value)
  }
  return String(value)
}

/**
 *
 * @param a
 * @param b
 */
function sameValue(a: unknown, b: unknown): boolean {
  return describeValue(a) === describeValue(b)
}

/**
 * Merge an authoritative readback into the snapshot.
 *
 * Readback values overwrite optimistic ones; every pending value that disagreed
 * is reported as a correction. A mode change that did not come from the host
 * (front panel) leaves the instrument auto-ranging, so the range falls back to
 * auto. Range, beeper and rate changes made on the front panel are not read
 * back while polling.
 * @param snapshot
 * @param update
 */
export function applyReadback(snapshot: DeviceSnapshot, update: ParsedUpdate): ReadbackResult {
  const patch: SnapshotPatch = { ...update.fields }

  if (Object.values(patch).every((value) => value === undefined) && update.confirms.length === 0) {
    return { snapshot, corrections: [] }
  }

  const corrections: Correction[] = []
  const readbackFields: CommandField[] = []

  for (const [key, field] of PATCH_COMMAND_FIELDS) {
    if (patch[key] === undefined) continue
    readbackFields.push(field)
    if (snapshot.pending.includes(field) && !sameValue(snapshot[key], patch[key])) {
      corrections.push({ field, optimistic: describeValue(snapshot[key]), readback: describeValue(patch[key]) })
    }
  }

  if (patch.mode !== undefined && snapshot.mode !== null && patch.mode !== snapshot.mode && !patch.range) {
    patch.range = { kind: 'auto' }
  }

  // A mode read under another diode/continuity mapping has to be read again
  const stale =
    patch.quirk !== undefined && snapshot.quirk?.policy !== patch.quirk.policy && !update.confirms.includes('mode')
  const kept = stale ? snapshot.confirmed.filter((field) => field !== 'mode') : snapshot.confirmed
  const confirmed = [...kept, ...update.confirms.filter((field) => !kept.includes(field))]
  const pending = snapshot.pending.filter((field) => !readbackFields.includes(field))

  return {
    snapshot: nextSnapshot(snapshot, { ...patch, confirmed, pending }),
    corrections,
  }
}

/**
 *
 * @param snapshot
 * @param message
 */
export function recordError(snapshot: DeviceSnapshot, message: string): DeviceSnapshot {
  return nextSnapshot(snapshot, { lastError: message })
}

/**
 * True once every sync field has had at least one confirmed readback.
 * @param snapshot
 */
export function isSyncComplete(snapshot: DeviceSnapshot): boolean {
  return SYNC_FIELDS.every((field) => snapshot.confirmed.includes(field))
}

// ============================================================================
// Snapshot Handoff
// ============================================================================

export type SnapshotListener<T> = (value: T) => void

/**
 * Read side of a snapshot channel.
 */
export interface SnapshotReader<T> {
  get(): T
  subscribe(listener: SnapshotListener<T>): () => void
}

/**
 * Single-slot, single-writer handoff. Readers always see the most recent
 * complete value; there is no queue to fall behind on.
 */
export class SnapshotChannel<T> implements SnapshotReader<T> {
  private current: T
  private readonly listeners = new Set<SnapshotListener<T>>()

  /**
   *
   * @param initial
   */
  constructor(initial: T) {
    this.current = initial
  }

  get(): T {
    return this.current
  }

  /**
   *
   * @param value
   */
  publish(value: T): void {
    this.current = value
    for (const listener of this.listeners) {
      try {
        listener(value)
      } catch (error) {
        log.error('[SnapshotChannel] Listener failed:', error)
      }
    }
  }

  /**
   *
   * @param listener
   */
  subscribe(listener: SnapshotListener<T>): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }
}

// ============================================================================
// DeviceStateMachine Class
// ============================================================================

/**
 * Owner of the current device snapshot.
 *
 * Wraps the pure reducers and publishes every new snapshot through a
 * SnapshotChannel; consumers get the read side only.
 */
export class DeviceStateMachine {
  private readonly channel = new SnapshotChannel<DeviceSnapshot>(createInitialSnapshot())

  get snapshots(): SnapshotReader<DeviceSnapshot> {
    return this.channel
  }

  get snapshot(): DeviceSnapshot {
    return this.channel.get()
  }

  get state(): ConnectionState {
    return this.channel.get().connection
  }

  /**
   *
   * @param to
   * @param lastError
   */
  transition(to: ConnectionState, lastError?: string): DeviceSnapshot {
    return this.publish(transition(this.snapshot, to, lastError))
  }

  /**
   *
   * @param command
   * @param markPending
   */
  applyCommand(command: ScpiSetCommand, markPending = true): DeviceSnapshot {
    return this.publish(applyCommand(this.snapshot, command, markPending))
  }

  /**
   *
   * @param update
   */
  applyReadback(update: ParsedUpdate): Correction[] {
    const result = applyReadback(this.snapshot, update)
    this.publish(result.snapshot)
    return result.corrections
  }

  /**
   *
   * @param message
   */
  recordError(message: string): DeviceSnapshot {
    return this.publish(recordError(this.snapshot, message))
  }

  isSyncComplete(): boolean {
    return isSyncComplete(this.snapshot)
  }

  /**
   *
   * @param snapshot
   */
  private publish(snapshot: DeviceSnapshot): DeviceSnapshot {
    if (snapshot !== this.channel.get()) {
      this.channel.publish(snapshot)
    }
    return snapshot
  }
}
