/**
 * Pinia store for live multimeter state.
 *
 * Fed by the poller's 'refresh' frames, so the UI updates on its own cadence no
 * matter how fast the instrument is polled. Holds the latest snapshot and
 * measurement, a rolling graph buffer and the histogram samples.
 */

import { defineStore } from 'pinia'
import { computed, ref, shallowRef } from 'vue'

import { createInitialSnapshot } from '@/services/device-state'
import { DEFAULT_CONFIG, MAX_BUFFER_DEPTH, validateInteger } from '@/services/multimeter-config'
import type { MultimeterPoller } from '@/services/multimeter-poller'
import {
  AUTO_BINS,
  computeHistogram,
  DEFAULT_HISTOGRAM_DEPTH,
  DEFAULT_HISTOGRAM_INTERVAL_MS,
  describeConnection,
  formatMeasurement,
  formatRange,
  graphValue,
  MAX_HISTOGRAM_BINS,
  MAX_HISTOGRAM_DEPTH,
  shouldCollectHistogramSample,
} from '@/stores/multimeter-common'
import type { DeviceSnapshot, Measurement, RefreshFrame } from '@/types/multimeter'

/**
 * Result of a store action that talks to the instrument
 */
export interface ActionResult {
  success: boolean
  error?: string
}

export const useMultimeterStore = defineStore('multimeter', () => {
  // Frozen objects from the device state machine; shallowRef keeps them as-is
  const snapshot = shallowRef<DeviceSnapshot>(createInitialSnapshot())
  const measurement = shallowRef<Measurement | null>(null)

  const graph = ref<(number | null)[]>([])
  const bufferDepth = ref(DEFAULT_CONFIG.bufferDepth)
  const lastError = ref<string | null>(null)

  // Histogram samples are collected on their own interval and depth
  const histogram = ref<number[]>([])
  const histogramCollecting = ref(false)
  const histogramIntervalMs = ref(DEFAULT_HISTOGRAM_INTERVAL_MS)
  const histogramDepth = ref(DEFAULT_HISTOGRAM_DEPTH)
  const histogramBins = ref(AUTO_BINS)
  let lastHistogramSampleMs: number | null = null

  let poller: MultimeterPoller | null = null
  let unbind: (() => void) | null = null

  // ==========================================================================
  // Getters
  // ==========================================================================

  const connection = computed(() => snapshot.value.connection)
  const isReady = computed(() => snapshot.value.connection === 'ready')
  const connectionLabel = computed(() => describeConnection(snapshot.value))
  const displayValue = computed(() => formatMeasurement(measurement.value))
  const displayRange = computed(() => formatRange(snapshot.value.range))
  const isOverflow = computed(() => measurement.value?.value.kind === 'overflow')
  const hasPendingChanges = computed(() => snapshot.value.pending.length > 0)
  const histogramData = computed(() => computeHistogram(histogram.value, histogramBins.value))

  // ==========================================================================
  // Frame handling
  // ==========================================================================

  /**
   * Apply a refresh frame. A measurement is added to the graph once, however
   * many frames repeat it.
   * @param frame
   */
  function applyFrame(frame: RefreshFrame): void {
    snapshot.value = frame.snapshot
    if (frame.snapshot.lastError) {
      lastError.value = frame.snapshot.lastError
    }

    if (frame.measurement && frame.measurement !== measurement.value) {
      measurement.value = frame.measurement
      graph.value.push(graphValue(frame.measurement))
      if (graph.value.length > bufferDepth.value) {
        graph.value.splice(0, graph.value.length - bufferDepth.value)
      }
      collectHistogramSample(frame.measurement)
    }
  }

  /**
   *
   * @param sample
   */
  function collectHistogramSample(sample: Measurement): void {
    const value = graphValue(sample)
    const nowMs = sample.timestamp.monotonicMs
    if (!histogramCollecting.value || value === null) {
      return
    }
    if (!shouldCollectHistogramSample(lastHistogramSampleMs, nowMs, histogramIntervalMs.value)) {
      return
    }

    histogram.value.push(value)
    lastHistogramSampleMs = nowMs
    if (histogram.value.length > histogramDepth.value) {
      histogram.value.splice(0, histogram.value.length - histogramDepth.value)
    }
  }

  function clearGraph(): void {
    graph.value = []
  }

  /**
   * @param depth - 1 to MAX_BUFFER_DEPTH samples
   */
  function setBufferDepth(depth: number): void {
    bufferDepth.value = validateInteger('bufferDepth', depth, 1, MAX_BUFFER_DEPTH)
    if (graph.value.length > depth) {
      graph.value.splice(0, graph.value.length - depth)
    }
  }

  // ==========================================================================
  // Histogram
  // ==========================================================================

  function startHistogram(): void {
    histogramCollecting.value = true
  }

  function stopHistogram(): void {
    histogramCollecting.value = false
  }

  function clearHistogram(): void {
    histogram.value = []
    lastHistogramSampleMs = null
  }

  /**
   * @param depth - 1 to MAX_HISTOGRAM_DEPTH samples
   */
  function setHistogramDepth(depth: number): void {
    histogramDepth.value = validateInteger('histogramDepth', depth, 1, MAX_HISTOGRAM_DEPTH)
    if (histogram.value.length > depth) {
      histogram.value.splice(0, histogram.value.length - depth)
    }
  }

  /**
   * @param intervalMs - Minimum spacing between collected samples
   */
  function setHistogramInterval(intervalMs: number): void {
    histogramIntervalMs.value = validateInteger('histogramIntervalMs', intervalMs, 1)
  }

  /**
   * @param bins - Fixed bin count, or AUTO_BINS for the square-root rule
   */
  function setHistogramBins(bins: number): void {
    histogramBins.value = validateInteger('histogramBins', bins, AUTO_BINS, MAX_HISTOGRAM_BINS)
  }

  // ==========================================================================
  // Poller binding
  // ==========================================================================

  /**
   * Subscribe to a poller's refresh and error events. Replaces any earlier binding.
   * @param target
   * @returns Function that removes the subscriptions
   */
  function bindPoller(target: MultimeterPoller): () => void {
    unbindPoller()

    const onRefresh = (frame: RefreshFrame): void => applyFrame(frame)
    const onError = (error: Error): void => {
      lastError.value = error.message
    }

    target.on('refresh', onRefresh)
    target.on('error', onError)
    poller = target
    bufferDepth.value = target.getConfig().bufferDepth
    snapshot.value = target.getSnapshot()

    unbind = () => {
      target.off('refresh', onRefresh)
      target.off('error', onError)
    }
    return unbindPoller
  }

  function unbindPoller(): void {
    unbind?.()
    unbind = null
    poller = null
  }

  // ==========================================================================
  // Actions
  // ==========================================================================

  /**
   *
   * @param port
   */
  async function connect(port: string): Promise<ActionResult> {
    if (!poller) {
      return { success: false, error: 'No poller bound' }
    }

    try {
      lastError.value = null
      clearGraph()
      clearHistogram()
      await poller.connect(port)
      snapshot.value = poller.getSnapshot()
      return { success: true }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      lastError.value = message
      snapshot.value = poller.getSnapshot()
      return { success: false, error: message }
    }
  }

  async function disconnect(): Promise<ActionResult> {
    if (!poller) {
      return { success: false, error: 'No poller bound' }
    }

    await poller.disconnect()
    snapshot.value = poller.getSnapshot()
    measurement.value = null
    return { success: true }
  }

  return {
    snapshot,
    measurement,
    graph,
    bufferDepth,
    lastError,
    histogram,
    histogramCollecting,
    histogramIntervalMs,
    histogramDepth,
    histogramBins,
    connection,
    isReady,
    connectionLabel,
    displayValue,
    displayRange,
    isOverflow,
    hasPendingChanges,
    histogramData,
    applyFrame,
    clearGraph,
    setBufferDepth,
    startHistogram,
    stopHistogram,
    clearHistogram,
    setHistogramDepth,
    setHistogramInterval,
    setHistogramBins,
    bindPoller,
    unbindPoller,
    connect,
    disconnect,
  }
})
