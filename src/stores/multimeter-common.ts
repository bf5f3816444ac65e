/**
 * Display helpers shared by the multimeter store and its views.
 *
 * Everything here is pure: measurement and snapshot in, display values out.
 */

import type { ConnectionState, DeviceSnapshot, Measurement, RangeSetting } from '@/types/multimeter'

const SI_PREFIXES: readonly (readonly [number, string])[] = [
  [1e9, 'G'],
  [1e6, 'M'],
  [1e3, 'k'],
  [1, ''],
  [1e-3, 'm'],
  [1e-6, 'µ'],
  [1e-9, 'n'],
  [1e-12, 'p'],
]

/** Units shown without SI prefix scaling */
const UNSCALED_UNITS = new Set(['°C', '°F', '%', 'dB'])

/**
 * Value plotted for a measurement. Overflow readings are gaps, never numbers.
 * @param measurement
 */
export function graphValue(measurement: Measurement): number | null {
  return measurement.value.kind === 'numeric' ? measurement.value.value : null
}

/**
 * Format a reading for display, e.g. "12.3400 mV" or "OL Ω".
 * @param measurement - Latest measurement, or null before the first one
 * @param digits - Significant digits
 */
export function formatMeasurement(measurement: Measurement | null, digits = 6): string {
  if (!measurement) {
    return '----'
  }
  if (measurement.value.kind === 'overflow') {
    return `OL ${measurement.unit}`
  }

  const value = measurement.value.value
  if (UNSCALED_UNITS.has(measurement.unit) || value === 0) {
    return `${value.toPrecision(digits)} ${measurement.unit}`
  }

  const magnitude = Math.abs(value)
  const [scale, prefix] = SI_PREFIXES.find(([factor]) => magnitude >= factor) ?? [1e-12, 'p']
  return `${(value / scale).toPrecision(digits)} ${prefix}${measurement.unit}`
}

/**
 *
 * @param range
 */
export function formatRange(range: RangeSetting | null): string {
  if (!range) {
    return '-'
  }
  return range.kind === 'auto' ? 'Auto' : range.label
}

/**
 * Human-readable connection status.
 * @param snapshot
 */
export function describeConnection(snapshot: DeviceSnapshot): string {
  const labels: Record<ConnectionState, string> = {
    disconnected: 'Disconnected',
    connecting: 'Connecting...',
    syncing: 'Reading device settings...',
    ready: 'Connected',
  }

  if (snapshot.connection === 'ready' && snapshot.identity) {
    return `${labels.ready} (${snapshot.identity.model}, firmware ${snapshot.identity.firmware})`
  }
  return labels[snapshot.connection]
}

// ============================================================================
// Histogram
// ============================================================================

/** Requested bin count meaning "square root of the sample count" */
export const AUTO_BINS = 0
export const MAX_HISTOGRAM_BINS = 100

export const DEFAULT_HISTOGRAM_DEPTH = 1000
export const MAX_HISTOGRAM_DEPTH = 10000
export const DEFAULT_HISTOGRAM_INTERVAL_MS = 100

export interface HistogramBin {
  start: number
  end: number
  count: number
}

/**
 * @param sampleCount
 * @param requested - Fixed bin count, or AUTO_BINS
 */
export function histogramBinCount(sampleCount: number, requested: number): number {
  if (requested !== AUTO_BINS) {
    return Math.max(1, requested)
  }
  return Math.max(1, Math.ceil(Math.sqrt(sampleCount)))
}

/**
 * Bin samples over [min, max] in equal widths. The maximum lands in the last
 * bin; a single distinct value gets a bin one unit wide around it.
 * @param values
 * @param requestedBins - Fixed bin count, or AUTO_BINS
 */
export function computeHistogram(values: readonly number[], requestedBins: number = AUTO_BINS): HistogramBin[] {
  if (values.length === 0) {
    return []
  }

  let min = Math.min(...values)
  let max = Math.max(...values)
  if (min === max) {
    min -= 0.5
    max += 0.5
  }

  const binCount = histogramBinCount(values.length, requestedBins)
  const width = (max - min) / binCount
  const counts = Array.from({ length: binCount }, () => 0)
  for (const value of values) {
    counts[Math.min(Math.floor((value - min) / width), binCount - 1)]++
  }

  return counts.map((count, i) => ({
    start: min + i * width,
    end: i === binCount - 1 ? max : min + (i + 1) * width,
    count,
  }))
}

/**
 * True when a new histogram sample is due.
 * @param lastSampleMs - Monotonic time of the last collected sample, null before the first
 * @param nowMs
 * @param intervalMs
 */
export function shouldCollectHistogramSample(lastSampleMs: number | null, nowMs: number, intervalMs: number): boolean {
  return lastSampleMs === null || nowMs - lastSampleMs >= intervalMs
}
