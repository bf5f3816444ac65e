/**
 * SCPI Protocol Codec (TypeScript)
 *
 * Encodes host commands into SCPI command lines and decodes instrument output
 * into loosely typed tokens for the response parser.
 *
 * ARCHITECTURE:
 * - Tokenizes raw byte streams from serial into terminated lines
 * - Classifies each line by frame shape (identity, numeric, word, boolean)
 * - Pairs a frame with the single outstanding query; anything else is dropped
 * - Knows nothing about measurement semantics beyond the wire identifiers
 *
 * PROTOCOL REFERENCE:
 * OWON XDM1041/XDM1241 SCPI-over-serial profile (8N1, commands terminated by LF,
 * responses terminated by CRLF). Set commands are not acknowledged.
 */

import rangeTable from '../data/owon-ranges.json'
import type { MeasurementMode, RangeSetting, SampleRate, ThresholdKind } from '../types/multimeter'

// ============================================================================
// Protocol Constants
// ============================================================================

/** Line termination expected by device input (LF) */
export const INPUT_TERMINATOR = '\n'

export const DEFAULT_BAUD_RATE = 115200

export const CMD_IDENTIFY = '*IDN?'
export const CMD_RESET = '*RST'
export const CMD_MEASURE = 'MEAS?'
export const CMD_FUNCTION = 'FUNC?'
export const CMD_RANGE = 'RANGE?'
export const CMD_AUTO_RANGE = 'AUTO?'
export const CMD_BEEPER = 'SYST:BEEP:STATe'
export const CMD_REMOTE = 'SYST:REM'
export const CMD_LOCAL = 'SYST:LOC'
export const CMD_RATE = 'RATE'

export const THRESHOLD_COMMANDS: Record<ThresholdKind, string> = {
  continuity: 'CONT:THREshold',
  diode: 'DIOD:THREshold',
}

export const RATE_CODES: Record<SampleRate, string> = {
  slow: 'S',
  medium: 'M',
  fast: 'F',
}

/**
 * CONF: prefix per measurement mode. The ambiguous pseudo-mode has no command.
 */
export const CONFIGURE_PREFIXES: Record<Exclude<MeasurementMode, 'diodeContinuityAmbiguous'>, string> = {
  dcv: 'CONF:VOLT:DC',
  acv: 'CONF:VOLT:AC',
  dci: 'CONF:CURR:DC',
  aci: 'CONF:CURR:AC',
  resistance2w: 'CONF:RES',
  resistance4w: 'CONF:FRES',
  capacitance: 'CONF:CAP',
  frequency: 'CONF:FREQ',
  period: 'CONF:PER',
  continuity: 'CONF:CONT',
  diode: 'CONF:DIOD',
  temperature: 'CONF:TEMP:RTD',
  dutyCycle: 'CONF:DUTY',
}

/**
 * FUNC? readback identifiers as they appear on the wire (quotes stripped,
 * ':' normalized to ' '). CONT and DIOD are subject to the firmware swap quirk.
 */
export const FUNCTION_IDENTIFIERS: Record<string, MeasurementMode> = {
  VOLT: 'dcv',
  'VOLT DC': 'dcv',
  'VOLT AC': 'acv',
  CURR: 'dci',
  'CURR DC': 'dci',
  'CURR AC': 'aci',
  RES: 'resistance2w',
  FRES: 'resistance4w',
  CAP: 'capacitance',
  FREQ: 'frequency',
  PER: 'period',
  CONT: 'continuity',
  DIOD: 'diode',
  TEMP: 'temperature',
  DUTY: 'dutyCycle',
}

/** Default temperature sensor when the range is 'auto' */
export const DEFAULT_TEMPERATURE_SENSOR = 'PT100'

const MAX_BUFFER_SIZE = 4096
const BUFFER_TRIM_SIZE = 512

// ============================================================================
// Regular Expressions for Frame Shapes
// ============================================================================

/** *IDN? response: <manufacturer>,<model>,<serial>,<firmware>[,...] */
export const RE_IDENTITY_FRAME = /^[^,]+,[^,]+,[^,]*,[^,]+(?:,.*)?$/

/** Floating point value, optionally in E notation: "-1.2345E-03" */
export const RE_NUMERIC_FRAME = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/

/** Identifier, optionally quoted: "VOLT AC", CONT, PT100 */
export const RE_WORD_FRAME = /^"?[A-Z][A-Z0-9]*(?:[ :][A-Z]+)?"?$/i

/** Boolean state readback */
export const RE_BOOLEAN_FRAME = /^(?:ON|OFF|0|1)$/i

/** Anything outside printable ASCII, e.g. a byte with a flipped high bit */
const RE_NON_PRINTABLE = /[^\x20-\x7e]/

// ============================================================================
// Type Definitions
// ============================================================================

export type ScpiQuery =
  | { type: 'identify' }
  | { type: 'measure' }
  | { type: 'queryFunction' }
  | { type: 'queryRange' }
  | { type: 'queryAutoRange' }
  | { type: 'queryBeeper' }
  | { type: 'queryThreshold'; threshold: ThresholdKind }

export type ScpiSetCommand =
  | { type: 'configure'; mode: MeasurementMode; range?: RangeSetting }
  | { type: 'setRate'; rate: SampleRate }
  | { type: 'setBeeper'; enabled: boolean }
  | { type: 'setRemoteLock'; locked: boolean }
  | { type: 'setThreshold'; threshold: ThresholdKind; value: number }
  | { type: 'reset' }

export type ScpiCommand = ScpiQuery | ScpiSetCommand

export type FrameShape = 'identity' | 'numeric' | 'word' | 'boolean'

/**
 * Decoded response line. Fields are still plain strings; the response parser
 * gives them meaning.
 */
export interface RawToken {
  query: ScpiQuery
  fields: readonly string[]
  raw: string
}

export interface RangeOption {
  label: string
  scpi: string
}

const EXPECTED_SHAPES: Record<ScpiQuery['type'], readonly FrameShape[]> = {
  identify: ['identity'],
  measure: ['numeric'],
  queryFunction: ['word'],
  queryRange: ['numeric', 'word'],
  queryAutoRange: ['boolean'],
  queryBeeper: ['boolean'],
  queryThreshold: ['numeric'],
}

const QUERY_TYPES: ReadonlySet<string> = new Set(Object.keys(EXPECTED_SHAPES))

const RANGE_OPTIONS: Partial<Record<MeasurementMode, readonly RangeOption[]>> = rangeTable

// ============================================================================
// Custom Errors
// ============================================================================

export type DecodeErrorKind = 'malformed' | 'truncated' | 'unexpected'

/**
 *
 */
export class DecodeError extends Error {
  readonly kind: DecodeErrorKind
  readonly line: string

  /**
   *
   * @param kind
   * @param line
   * @param message
   */
  constructor(kind: DecodeErrorKind, line: string, message: string) {
    super(message)
    this.name = 'DecodeError'
    this.kind = kind
    this.line = line
  }
}

/**
 *
 */
export class InvalidCommandError extends Error {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'InvalidCommandError'
  }
}

// ============================================================================
// Range Tables
// ============================================================================

/**
 * Selectable fixed ranges for a mode. Modes without ranges return an empty list.
 * @param mode
 */
export function rangeOptionsFor(mode: MeasurementMode): readonly RangeOption[] {
  return RANGE_OPTIONS[mode] ?? []
}

/**
 * Look up a fixed range by its display label ("5V") or SCPI argument ("5").
 * @param mode
 * @param labelOrScpi
 */
export function findRangeOption(mode: MeasurementMode, labelOrScpi: string): RangeOption | null {
  const wanted = labelOrScpi.trim().toUpperCase()
  return (
    rangeOptionsFor(mode).find(
      (option) => option.label.toUpperCase() === wanted || option.scpi.toUpperCase() === wanted
    ) ?? null
  )
}

/**
 * Match a RANGE? readback against the table. Numeric readbacks are compared by
 * value so that "5.000000E+00" matches "5".
 * @param mode
 * @param readback
 */
export function matchRangeReadback(mode: MeasurementMode, readback: string): RangeOption | null {
  const trimmed = readback.trim()
  if (!RE_NUMERIC_FRAME.test(trimmed)) {
    return findRangeOption(mode, trimmed)
  }

  const value = parseFloat(trimmed)
  return (
    rangeOptionsFor(mode).find((option) => {
      if (!RE_NUMERIC_FRAME.test(option.scpi)) {
        return false
      }
      const optionValue = parseFloat(option.scpi)
      return Math.abs(optionValue - value) <= Math.abs(optionValue) * 1e-9
    }) ?? null
  )
}

// ============================================================================
// Encoding
// ============================================================================

/**
 *
 * @param command
 */
export function isQuery(command: ScpiCommand): command is ScpiQuery {
  return QUERY_TYPES.has(command.type)
}

/**
 * Render a command as its SCPI text, without the line terminator.
 * @param command
 * @throws InvalidCommandError if the command cannot be expressed on the wire
 */
export function formatCommand(command: ScpiCommand): string {
  switch (command.type) {
    case 'identify':
      return CMD_IDENTIFY
    case 'measure':
      return CMD_MEASURE
    case 'queryFunction':
      return CMD_FUNCTION
    case 'queryRange':
      return CMD_RANGE
    case 'queryAutoRange':
      return CMD_AUTO_RANGE
    case 'queryBeeper':
      return `${CMD_BEEPER}?`
    case 'queryThreshold':
      return `${THRESHOLD_COMMANDS[command.threshold]}?`
    case 'configure':
      return formatConfigure(command.mode, command.range)
    case 'setRate':
      return `${CMD_RATE} ${RATE_CODES[command.rate]}`
    case 'setBeeper':
      return `${CMD_BEEPER} ${command.enabled ? 'ON' : 'OFF'}`
    case 'setRemoteLock':
      return command.locked ? CMD_REMOTE : CMD_LOCAL
    case 'setThreshold':
      if (!Number.isFinite(command.value) || command.value < 0) {
        throw new InvalidCommandError(`Threshold must be a non-negative number, got ${command.value}`)
      }
      return `${THRESHOLD_COMMANDS[command.threshold]} ${command.value}`
    case 'reset':
      return CMD_RESET
  }
}

/**
 * Encode a command as ASCII bytes terminated per SCPI convention.
 * @param command
 */
export function encode(command: ScpiCommand): Buffer {
  return Buffer.from(formatCommand(command) + INPUT_TERMINATOR, 'ascii')
}

/**
 *
 * @param mode
 * @param range
 */
function formatConfigure(mode: MeasurementMode, range: RangeSetting = { kind: 'auto' }): string {
  if (mode === 'diodeContinuityAmbiguous') {
    throw new InvalidCommandError('Cannot configure the ambiguous diode/continuity mode')
  }

  const prefix = CONFIGURE_PREFIXES[mode]
  const options = rangeOptionsFor(mode)

  if (options.length === 0) {
    if (range.kind === 'fixed') {
      throw new InvalidCommandError(`Mode ${mode} has no selectable ranges`)
    }
    return prefix
  }

  if (range.kind === 'auto') {
    return `${prefix} ${mode === 'temperature' ? DEFAULT_TEMPERATURE_SENSOR : 'AUTO'}`
  }

  const option = findRangeOption(mode, range.scpi)
  if (!option) {
    throw new InvalidCommandError(`Range ${range.label} is not valid for mode ${mode}`)
  }
  return `${prefix} ${option.scpi}`
}

// ============================================================================
// Line Framing
// ============================================================================

/**
 * Tokenizer for instrument output.
 *
 * Accepts raw byte buffers from the serial port and returns complete lines with
 * their terminator still attached, so the decoder can tell a complete frame from
 * a truncated one. Blank lines are skipped.
 */
export class ScpiLineFramer {
  private buffer = ''

  /**
   * Feed raw bytes from the serial port.
   * @param data - Raw buffer from serial port
   * @returns Complete lines, terminator included
   */
  feed(data: Buffer): string[] {
    this.buffer += data.toString('latin1')

    const lines: string[] = []
    let endIdx = this.buffer.indexOf('\n')
    while (endIdx !== -1) {
      const line = this.buffer.slice(0, endIdx + 1)
      this.buffer = this.buffer.slice(endIdx + 1)
      if (line.trim()) {
        lines.push(line)
      }
      endIdx = this.buffer.indexOf('\n')
    }

    // Unterminated garbage must not grow without bound on a noisy link
    if (this.buffer.length > MAX_BUFFER_SIZE) {
      this.buffer = this.buffer.slice(-BUFFER_TRIM_SIZE)
    }

    return lines
  }

  /**
   * Return and clear the incomplete tail, if any.
   */
  takePartial(): string {
    const partial = this.buffer
    this.buffer = ''
    return partial
  }

  getBufferSize(): number {
    return this.buffer.length
  }
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * All frame shapes a (terminator-stripped) line matches.
 * @param line
 */
export function classifyFrame(line: string): FrameShape[] {
  const shapes: FrameShape[] = []
  if (RE_IDENTITY_FRAME.test(line)) shapes.push('identity')
  if (RE_NUMERIC_FRAME.test(line)) shapes.push('numeric')
  if (RE_WORD_FRAME.test(line)) shapes.push('word')
  if (RE_BOOLEAN_FRAME.test(line)) shapes.push('boolean')
  return shapes
}

/**
 * Decode one response line against the outstanding query.
 * @param bytes - Line as received, terminator included
 * @param pending - The query awaiting a response, or null if none is outstanding
 * @returns Raw token for the response parser
 * @throws DecodeError when the line is truncated, matches no frame shape, or
 *   does not answer the outstanding query
 */
export function decode(bytes: Buffer | string, pending: ScpiQuery | null): RawToken {
  const text = typeof bytes === 'string' ? bytes : bytes.toString('latin1')

  if (!text.endsWith('\n')) {
    throw new DecodeError('truncated', text, `Incomplete line: ${JSON.stringify(text)}`)
  }

  const line = text.trim()
  const shapes = RE_NON_PRINTABLE.test(line) ? [] : classifyFrame(line)
  if (shapes.length === 0) {
    throw new DecodeError('malformed', line, `Line doesn't match any frame shape: ${JSON.stringify(line)}`)
  }

  if (!pending) {
    throw new DecodeError('unexpected', line, `Unsolicited frame: ${line}`)
  }

  const expected = EXPECTED_SHAPES[pending.type]
  const shape = shapes.find((candidate) => expected.includes(candidate))
  if (!shape) {
    throw new DecodeError('unexpected', line, `Frame '${line}' does not answer ${formatCommand(pending)}`)
  }

  return {
    query: pending,
    fields: shape === 'identity' ? line.split(',').map((field) => field.trim()) : [normalizeWord(line)],
    raw: line,
  }
}

/**
 *
 * @param word
 */
function normalizeWord(word: string): string {
  return word.replace(/^"|"$/g, '').replace(/:/g, ' ').trim()
}
