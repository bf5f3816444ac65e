/**
 * Unit tests for the Multimeter Poller
 *
 * These tests drive the poller against an in-process fake instrument:
 * sync burst, measurement polling, optimistic commands and readback
 * corrections, timeout handling, cancellation and recording hookup.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import type { Correction } from '../src/services/device-state'
import { InvalidTransitionError } from '../src/services/device-state'
import { QuirkAmbiguousError } from '../src/services/firmware-quirks'
import type { MultimeterConfig } from '../src/services/multimeter-config'
import { createMultimeterConfig } from '../src/services/multimeter-config'
import { DeviceUnresponsiveError, SyncError } from '../src/services/multimeter-poller'
import type { RecordingSink } from '../src/services/recording-session'
import { RecordingSession, SinkError } from '../src/services/recording-session'
import { InvalidCommandError } from '../src/services/scpi-protocol'
import { ParseError } from '../src/services/scpi-response-parser'
import type { SerialTransport } from '../src/services/serial-transport'
import { TransportError } from '../src/services/serial-transport'
import type { ConnectionState, RecordingRecord, RefreshFrame } from '../src/types/multimeter'
import type { FakeInstrumentState } from './helpers/fake-instrument'
import { FakeInstrumentTransport } from './helpers/fake-instrument'
import { TestPoller } from './helpers/test-poller'

// ============================================================================
// Test Utilities
// ============================================================================

const POLL_INTERVAL_MS = 50
const UI_REFRESH_INTERVAL_MS = 100

const SYNC_WRITES = [
  '*IDN?',
  'FUNC?',
  'RANGE?',
  'AUTO?',
  'SYST:BEEP:STATe?',
  'CONT:THREshold?',
  'DIOD:THREshold?',
]

// Default host settings written after the sync burst
const SETTINGS_WRITES = [
  'RATE S',
  'SYST:BEEP:STATe ON',
  'SYST:BEEP:STATe?',
  'CONT:THREshold 50',
  'CONT:THREshold?',
  'DIOD:THREshold 2',
  'DIOD:THREshold?',
]

const CONNECT_WRITES = [...SYNC_WRITES, ...SETTINGS_WRITES]

/**
 *
 * @param state
 * @param overrides
 */
function createPoller(state: Partial<FakeInstrumentState> = {}, overrides: Partial<MultimeterConfig> = {}): TestPoller {
  const config = createMultimeterConfig({
    pollIntervalMs: POLL_INTERVAL_MS,
    uiRefreshIntervalMs: UI_REFRESH_INTERVAL_MS,
    ...overrides,
  })
  return new TestPoller(() => new FakeInstrumentTransport(state), config)
}

/**
 *
 * @param poller
 * @param count
 */
async function pollTimes(poller: TestPoller, count: number): Promise<void> {
  for (let i = 0; i < count; i++) {
    await poller.poll()
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('MultimeterPoller', () => {
  let poller: TestPoller

  beforeEach(() => {
    poller = createPoller()
  })

  afterEach(async () => {
    await poller.disconnect()
  })

  describe('Connection Management', () => {
    it('should start disconnected', () => {
      expect(poller.getState()).toBe('disconnected')
      expect(poller.isConnected()).toBe(false)
      expect(poller.getSnapshot().connection).toBe('disconnected')
    })

    it('should run the sync burst in order and become ready', async () => {
      await poller.connect('/dev/ttyTEST0')

      expect(poller.instrument.writes).toEqual(CONNECT_WRITES)
      expect(poller.getState()).toBe('ready')
      expect(poller.isConnected()).toBe(true)

      const snapshot = poller.getSnapshot()
      expect(snapshot.identity).toEqual({
        manufacturer: 'OWON',
        model: 'XDM1041',
        serialNumber: 'TEST0001',
        firmware: 'V4.3.0',
      })
      expect(snapshot.mode).toBe('dcv')
      expect(snapshot.range).toEqual({ kind: 'auto' })
      expect(snapshot.beeperEnabled).toBe(true)
      expect(snapshot.continuityThreshold).toBe(50)
      expect(snapshot.diodeThreshold).toBe(2)
      expect(snapshot.quirk?.policy).toBe('passthrough')
      expect(snapshot.rate).toBe('slow')
      expect(snapshot.pending).toEqual([])
    })

    it('should write the configured settings after sync and read them back', async () => {
      poller = createPoller({}, { sampleRate: 'fast', beeperEnabled: false, continuityThreshold: 10, diodeThreshold: 1 })
      await poller.connect('/dev/ttyTEST0')

      expect(poller.instrument.writes.slice(SYNC_WRITES.length)).toEqual([
        'RATE F',
        'SYST:BEEP:STATe OFF',
        'SYST:BEEP:STATe?',
        'CONT:THREshold 10',
        'CONT:THREshold?',
        'DIOD:THREshold 1',
        'DIOD:THREshold?',
      ])
      expect(poller.instrument.state.beeper).toBe(false)

      const snapshot = poller.getSnapshot()
      expect(snapshot.rate).toBe('fast')
      expect(snapshot.beeperEnabled).toBe(false)
      expect(snapshot.continuityThreshold).toBe(10)
      expect(snapshot.diodeThreshold).toBe(1)
      expect(snapshot.pending).toEqual([])
    })

    it('should open the port with the configured baud rate', async () => {
      await poller.connect('/dev/ttyTEST0')
      expect(poller.openedWith).toEqual([{ path: '/dev/ttyTEST0', baudRate: 115200 }])
    })

    it('should emit state-change events through the whole lifecycle', async () => {
      const states: ConnectionState[] = []
      poller.on('state-change', (state: ConnectionState) => states.push(state))

      await poller.connect('/dev/ttyTEST0')
      await poller.disconnect()

      expect(states).toEqual(['connecting', 'syncing', 'ready', 'disconnected'])
    })

    it('should reject a second connect while connected', async () => {
      await poller.connect('/dev/ttyTEST0')
      await expect(poller.connect('/dev/ttyTEST1')).rejects.toThrow(InvalidTransitionError)
    })

    it('should start poll and UI refresh intervals only once ready', async () => {
      expect(poller.activeIntervals()).toEqual([])
      await poller.connect('/dev/ttyTEST0')
      expect(poller.activeIntervals()).toEqual([POLL_INTERVAL_MS, UI_REFRESH_INTERVAL_MS])
    })

    it('should clean up on disconnect', async () => {
      await poller.connect('/dev/ttyTEST0')
      const transport = poller.instrument

      await poller.disconnect()

      expect(poller.getState()).toBe('disconnected')
      expect(transport.isOpen).toBe(false)
      expect(transport.closeCalls).toBe(1)
      expect(poller.activeIntervals()).toEqual([])
      expect(poller.getSnapshot().identity).toBeNull()
      expect(poller.getLatestMeasurement()).toBeNull()
    })

    it('should allow reconnection after disconnect', async () => {
      await poller.connect('/dev/ttyTEST0')
      await poller.disconnect()

      await poller.reconnect()

      expect(poller.getState()).toBe('ready')
      expect(poller.transports).toHaveLength(2)
      expect(poller.openedWith[1]).toEqual({ path: '/dev/ttyTEST0', baudRate: 115200 })
    })

    it('should refuse to reconnect without a previous connection', async () => {
      await expect(poller.reconnect()).rejects.toThrow(TransportError)
    })

    it('should report an open failure and stay disconnected', async () => {
      const failing = new (class extends TestPoller {
        protected override createTransport(): Promise<SerialTransport> {
          return Promise.reject(new TransportError('open', 'Failed to open port /dev/ttyMISSING: no such file'))
        }
      })(() => new FakeInstrumentTransport(), createMultimeterConfig())

      await expect(failing.connect('/dev/ttyMISSING')).rejects.toThrow('no such file')
      expect(failing.getState()).toBe('disconnected')
      expect(failing.getSnapshot().lastError).toBe('Failed to open port /dev/ttyMISSING: no such file')
    })
  })

  describe('Sync Burst', () => {
    it('should retry fields whose query timed out', async () => {
      poller = new TestPoller(() => {
        const transport = new FakeInstrumentTransport()
        transport.respondOnce('FUNC?')
        return transport
      }, createMultimeterConfig())

      await poller.connect('/dev/ttyTEST0')

      expect(poller.getState()).toBe('ready')
      expect(poller.getSnapshot().mode).toBe('dcv')
      expect(poller.instrument.writes.filter((command) => command === 'FUNC?')).toHaveLength(2)
      expect(poller.getHealth().consecutiveTimeouts).toBe(0)
    })

    it('should read the mode again when *IDN? answers late and changes the mapping', async () => {
      poller = new TestPoller(() => {
        const transport = new FakeInstrumentTransport({ functionId: '"CONT"' })
        transport.respondOnce('*IDN?')
        return transport
      }, createMultimeterConfig())

      await poller.connect('/dev/ttyTEST0')

      expect(poller.instrument.writes.slice(0, 9)).toEqual([...SYNC_WRITES, '*IDN?', 'FUNC?'])
      expect(poller.instrument.writes.slice(9)).toEqual(SETTINGS_WRITES)
      expect(poller.getState()).toBe('ready')
      expect(poller.getSnapshot().quirk?.policy).toBe('passthrough')
      expect(poller.getSnapshot().mode).toBe('continuity')
    })

    it('should confirm a fixed range missing from the table and warn about it', async () => {
      poller = createPoller({ functionId: '"RES"', autoRange: false, range: '5E9' })
      const warnings: Error[] = []
      poller.on('warning', (warning: Error) => warnings.push(warning))

      await poller.connect('/dev/ttyTEST0')

      expect(poller.getState()).toBe('ready')
      expect(poller.getSnapshot().mode).toBe('resistance2w')
      expect(poller.getSnapshot().range).toEqual({ kind: 'fixed', label: '5E9', scpi: '5E9' })
      expect(warnings).toHaveLength(1)
      expect(warnings[0]).toBeInstanceOf(ParseError)
      expect(warnings[0].message).toBe('Range 5E9 is not in the table for mode resistance2w')
    })

    it('should report 4-wire resistance as auto-ranged whatever the range readback', async () => {
      poller = createPoller({ functionId: '"FRES"', autoRange: false, range: '500E3' })
      const warnings: Error[] = []
      poller.on('warning', (warning: Error) => warnings.push(warning))

      await poller.connect('/dev/ttyTEST0')

      expect(poller.getState()).toBe('ready')
      expect(poller.getSnapshot().mode).toBe('resistance4w')
      expect(poller.getSnapshot().range).toEqual({ kind: 'auto' })
      expect(warnings).toEqual([])
    })

    it('should fail with a sync error when a field never confirms', async () => {
      poller = createPoller({ functionId: '"BOGUS"' })

      await expect(poller.connect('/dev/ttyTEST0')).rejects.toThrow(SyncError)
      expect(poller.getState()).toBe('disconnected')
      expect(poller.getSnapshot().lastError).toBe('Device did not confirm: mode')
      expect(poller.instrument.writes).toEqual([...SYNC_WRITES, 'FUNC?', 'FUNC?'])
    })

    it('should fail to connect when the device never answers', async () => {
      const silentPoller = new TestPoller(() => {
        const transport = new FakeInstrumentTransport()
        transport.silent = true
        return transport
      }, createMultimeterConfig())

      await expect(silentPoller.connect('/dev/ttyTEST0')).rejects.toThrow(DeviceUnresponsiveError)
      expect(silentPoller.getState()).toBe('disconnected')
      expect(silentPoller.getSnapshot().lastError).toBe('No response after 3 consecutive queries')
      expect(silentPoller.instrument.writes).toEqual(['*IDN?', 'FUNC?', 'RANGE?'])
      expect(silentPoller.instrument.isOpen).toBe(false)
    })

    it('should lock the front panel after sync and release it on disconnect', async () => {
      poller = createPoller({}, { lockRemoteOnConnect: true })
      await poller.connect('/dev/ttyTEST0')
      const transport = poller.instrument

      expect(transport.writes).toEqual([...CONNECT_WRITES, 'SYST:REM'])
      expect(poller.getSnapshot().remoteLock).toBe(true)

      await poller.disconnect()
      expect(transport.writes[transport.writes.length - 1]).toBe('SYST:LOC')
    })
  })

  describe('Polling', () => {
    beforeEach(async () => {
      await poller.connect('/dev/ttyTEST0')
      poller.instrument.writes.length = 0
    })

    it('should query one measurement per poll cycle', async () => {
      await poller.poll()

      expect(poller.instrument.writes).toEqual(['MEAS?'])
      const measurement = poller.getLatestMeasurement()
      expect(measurement?.value).toEqual({ kind: 'numeric', value: 1.2345 })
      expect(measurement?.unit).toBe('V')
      expect(measurement?.mode).toBe('dcv')
      expect(measurement?.range).toEqual({ kind: 'auto' })
      expect(Object.isFrozen(measurement)).toBe(true)
    })

    it('should poll when the interval fires', async () => {
      const measured = new Promise<void>((resolve) => poller.once('measurement', () => resolve()))
      poller.fire(POLL_INTERVAL_MS)
      await measured

      expect(poller.getHealth().measurementsReceived).toBe(1)
    })

    it('should map overflow codes to overflow values', async () => {
      poller.instrument.state.measurement = '1E+9'
      await poller.poll()
      expect(poller.getLatestMeasurement()?.value).toEqual({ kind: 'overflow' })

      poller.instrument.state.measurement = '-9.9E37'
      await poller.poll()
      expect(poller.getLatestMeasurement()?.value).toEqual({ kind: 'overflow' })
    })

    it('should interleave a FUNC? readback every functionPollEvery measurements', async () => {
      await pollTimes(poller, 10)

      const writes = poller.instrument.writes
      expect(writes.filter((command) => command === 'MEAS?')).toHaveLength(10)
      expect(writes.filter((command) => command === 'FUNC?')).toHaveLength(1)
      expect(writes[writes.length - 1]).toBe('FUNC?')
    })

    it('should drop a frame with a corrupted byte and keep the next answer', async () => {
      poller.instrument.respondOnce('MEAS?', '1.2\u00b3', '2.5')

      await poller.poll()

      expect(poller.getLatestMeasurement()?.value).toEqual({ kind: 'numeric', value: 2.5 })
    })

    it('should drop malformed and unexpected frames and keep the real answer', async () => {
      poller.instrument.respondOnce('MEAS?', 'garbage!!', '"VOLT"', '2.5')

      await poller.poll()

      expect(poller.getLatestMeasurement()?.value).toEqual({ kind: 'numeric', value: 2.5 })
      expect(poller.getHealth().consecutiveTimeouts).toBe(0)
    })

    it('should discard stray lines before issuing a query', async () => {
      poller.instrument.inject('9.99')
      await poller.poll()
      expect(poller.getLatestMeasurement()?.value).toEqual({ kind: 'numeric', value: 1.2345 })
    })

    it('should publish refresh frames on the UI cadence', async () => {
      const frames: RefreshFrame[] = []
      poller.on('refresh', (frame: RefreshFrame) => frames.push(frame))

      poller.fire(UI_REFRESH_INTERVAL_MS)
      await poller.poll()
      poller.fire(UI_REFRESH_INTERVAL_MS)

      expect(frames).toHaveLength(2)
      expect(frames[0].measurement).toBeNull()
      expect(frames[0].snapshot.connection).toBe('ready')
      expect(frames[1].measurement).toBe(poller.getLatestMeasurement())
    })

    it('should reschedule the poll interval when it changes', () => {
      poller.setPollInterval(250)
      expect(poller.activeIntervals()).toEqual([UI_REFRESH_INTERVAL_MS, 250])
      expect(poller.getConfig().pollIntervalMs).toBe(250)
    })

    it('should reschedule the UI refresh interval when it changes', () => {
      poller.setUiRefreshInterval(500)
      expect(poller.activeIntervals()).toEqual([POLL_INTERVAL_MS, 500])
    })
  })

  describe('Timeouts', () => {
    beforeEach(async () => {
      await poller.connect('/dev/ttyTEST0')
    })

    it('should leave the snapshot unchanged on a timeout', async () => {
      const before = poller.getSnapshot()
      poller.instrument.silent = true

      await poller.poll()

      expect(poller.getSnapshot()).toBe(before)
      expect(poller.getHealth().consecutiveTimeouts).toBe(1)
      expect(poller.getState()).toBe('ready')
    })

    it('should reset the timeout counter after an answer', async () => {
      poller.instrument.silent = true
      await pollTimes(poller, 2)
      poller.instrument.silent = false
      await poller.poll()

      expect(poller.getHealth().consecutiveTimeouts).toBe(0)
    })

    it('should count a truncated frame as a timeout', async () => {
      poller.instrument.silent = true
      poller.instrument.injectPartial('1.23')

      await poller.poll()

      expect(poller.getHealth().consecutiveTimeouts).toBe(1)
      expect(poller.getLatestMeasurement()).toBeNull()
    })

    it('should disconnect after maxConsecutiveTimeouts', async () => {
      const errors: Error[] = []
      poller.on('error', (error: Error) => errors.push(error))
      const transport = poller.instrument
      transport.silent = true

      await pollTimes(poller, 3)

      expect(errors).toHaveLength(1)
      expect(errors[0]).toBeInstanceOf(DeviceUnresponsiveError)
      expect(poller.getState()).toBe('disconnected')
      expect(poller.getSnapshot().lastError).toBe('No response after 3 consecutive queries')
      expect(transport.isOpen).toBe(false)
    })

    it('should reach ready again on reconnect after the device recovers', async () => {
      poller.instrument.silent = true
      await pollTimes(poller, 3)
      expect(poller.getState()).toBe('disconnected')

      await poller.reconnect()

      expect(poller.getState()).toBe('ready')
      expect(poller.getSnapshot().lastError).toBeNull()
      await poller.poll()
      expect(poller.getLatestMeasurement()?.value).toEqual({ kind: 'numeric', value: 1.2345 })
    })
  })

  describe('Cancellation', () => {
    it('should abort a pending read on disconnect', async () => {
      await poller.connect('/dev/ttyTEST0')
      const transport = poller.instrument
      transport.hang = true

      const polling = poller.poll()
      await transport.waitForPendingRead()
      await poller.disconnect()
      await polling

      expect(poller.getState()).toBe('disconnected')
      expect(transport.isOpen).toBe(false)
      expect(poller.getSnapshot().lastError).toBeNull()
    })

    it('should keep a cycle failure as the last error when a disconnect is already running', async () => {
      await poller.connect('/dev/ttyTEST0')
      poller.instrument.failWrites = true

      const polling = poller.poll()
      await poller.disconnect()
      await polling

      expect(poller.getState()).toBe('disconnected')
      expect(poller.getSnapshot().lastError).toBe('Write failed: cable unplugged')
    })
  })

  describe('Host Commands', () => {
    let corrections: Correction[]

    beforeEach(() => {
      corrections = []
      poller.on('correction', (correction: Correction) => corrections.push(correction))
    })

    it('should reject commands while disconnected', () => {
      expect(() => poller.setBeeper(false)).toThrow(TransportError)
    })

    it('should apply a mode change optimistically and confirm it by readback', async () => {
      await poller.connect('/dev/ttyTEST0')
      poller.instrument.writes.length = 0

      const optimistic = poller.setMode('acv', '5V')
      expect(optimistic.mode).toBe('acv')
      expect(optimistic.range).toEqual({ kind: 'fixed', label: '5V', scpi: '5' })
      expect(optimistic.pending).toEqual(['mode', 'range'])

      await poller.poll()

      expect(poller.instrument.writes).toEqual(['CONF:VOLT:AC 5', 'FUNC?', 'RANGE?', 'AUTO?', 'MEAS?'])
      expect(poller.getSnapshot().mode).toBe('acv')
      expect(poller.getSnapshot().range).toEqual({ kind: 'fixed', label: '5V', scpi: '5' })
      expect(poller.getSnapshot().pending).toEqual([])
      expect(corrections).toEqual([])
      expect(poller.getLatestMeasurement()?.mode).toBe('acv')
    })

    it('should let the readback win over a disagreeing optimistic mode', async () => {
      poller = createPoller({ functionId: '"VOLT AC"', ignoresConfigure: true })
      poller.on('correction', (correction: Correction) => corrections.push(correction))
      await poller.connect('/dev/ttyTEST0')
      expect(poller.getSnapshot().mode).toBe('acv')

      expect(poller.setMode('dcv').mode).toBe('dcv')
      await poller.poll()

      expect(poller.getSnapshot().mode).toBe('acv')
      expect(poller.getSnapshot().range).toEqual({ kind: 'auto' })
      expect(poller.getSnapshot().pending).toEqual([])
      expect(corrections[0]).toEqual({ field: 'mode', optimistic: 'dcv', readback: 'acv' })
    })

    it('should reject an invalid range without touching the snapshot', async () => {
      await poller.connect('/dev/ttyTEST0')
      const before = poller.getSnapshot()

      expect(() => poller.setRange('7V')).toThrow(InvalidCommandError)
      expect(() => poller.setMode('frequency', '5V')).toThrow(InvalidCommandError)
      expect(poller.getSnapshot()).toBe(before)
      expect(poller.getHealth().queuedCommands).toBe(0)
    })

    it('should change range within the current mode', async () => {
      await poller.connect('/dev/ttyTEST0')
      poller.instrument.writes.length = 0

      poller.setRange('50V')
      await poller.poll()

      expect(poller.instrument.writes[0]).toBe('CONF:VOLT:DC 50')
      expect(poller.getSnapshot().range).toEqual({ kind: 'fixed', label: '50V', scpi: '50' })
    })

    it('should write beeper and threshold commands followed by their readbacks', async () => {
      await poller.connect('/dev/ttyTEST0')
      poller.instrument.writes.length = 0

      poller.setBeeper(false)
      poller.setThreshold('continuity', 30)
      expect(poller.getSnapshot().pending).toEqual(['beeper', 'continuityThreshold'])

      await poller.poll()

      expect(poller.instrument.writes).toEqual([
        'SYST:BEEP:STATe OFF',
        'SYST:BEEP:STATe?',
        'CONT:THREshold 30',
        'CONT:THREshold?',
        'MEAS?',
      ])
      expect(poller.getSnapshot().beeperEnabled).toBe(false)
      expect(poller.getSnapshot().continuityThreshold).toBe(30)
      expect(poller.getSnapshot().pending).toEqual([])
    })

    it('should keep rate changes pending since the rate has no readback', async () => {
      await poller.connect('/dev/ttyTEST0')
      poller.instrument.writes.length = 0

      poller.setRate('fast')
      await poller.poll()

      expect(poller.instrument.writes).toEqual(['RATE F', 'MEAS?'])
      expect(poller.getSnapshot().rate).toBe('fast')
      expect(poller.getSnapshot().pending).toEqual(['rate'])
    })

    it('should re-assert beeper and threshold when switching to continuity', async () => {
      await poller.connect('/dev/ttyTEST0')
      poller.instrument.writes.length = 0

      poller.setMode('continuity')
      await poller.poll()

      expect(poller.instrument.writes).toEqual([
        'CONF:CONT',
        'FUNC?',
        'RANGE?',
        'AUTO?',
        'SYST:BEEP:STATe ON',
        'SYST:BEEP:STATe?',
        'CONT:THREshold 50',
        'CONT:THREshold?',
        'MEAS?',
      ])
      expect(poller.getSnapshot().mode).toBe('continuity')
      expect(poller.getLatestMeasurement()?.unit).toBe('Ω')
    })

    it('should re-assert settings when the front panel switches to diode', async () => {
      poller = createPoller({}, { functionPollEvery: 1 })
      await poller.connect('/dev/ttyTEST0')
      poller.instrument.writes.length = 0
      poller.instrument.state.functionId = '"DIOD"'

      await poller.poll()
      expect(poller.getSnapshot().mode).toBe('diode')
      expect(poller.getSnapshot().range).toEqual({ kind: 'auto' })

      await poller.poll()
      expect(poller.instrument.writes).toEqual([
        'MEAS?',
        'FUNC?',
        'SYST:BEEP:STATe ON',
        'SYST:BEEP:STATe?',
        'DIOD:THREshold 2',
        'DIOD:THREshold?',
        'MEAS?',
        'FUNC?',
      ])
    })

    it('should re-assert the configured beeper and threshold on entering continuity', async () => {
      poller = createPoller({}, { beeperEnabled: false, continuityThreshold: 10 })
      await poller.connect('/dev/ttyTEST0')
      poller.instrument.state.beeper = true
      poller.instrument.state.continuityThreshold = 50
      poller.instrument.writes.length = 0

      poller.setMode('continuity')
      await poller.poll()

      expect(poller.instrument.writes).toEqual([
        'CONF:CONT',
        'FUNC?',
        'RANGE?',
        'AUTO?',
        'SYST:BEEP:STATe OFF',
        'SYST:BEEP:STATe?',
        'CONT:THREshold 10',
        'CONT:THREshold?',
        'MEAS?',
      ])
      expect(poller.getSnapshot().beeperEnabled).toBe(false)
      expect(poller.getSnapshot().continuityThreshold).toBe(10)
    })

    it('should keep host setting changes for later re-assertion', async () => {
      await poller.connect('/dev/ttyTEST0')

      poller.setBeeper(false)
      poller.setThreshold('diode', 1)
      poller.setRate('medium')

      expect(poller.getConfig().beeperEnabled).toBe(false)
      expect(poller.getConfig().diodeThreshold).toBe(1)
      expect(poller.getConfig().sampleRate).toBe('medium')
    })

    it('should send *RST and read every sync field back', async () => {
      await poller.connect('/dev/ttyTEST0')
      poller.instrument.writes.length = 0

      poller.resetDevice()
      await poller.poll()

      expect(poller.instrument.writes).toEqual(['*RST', ...SYNC_WRITES, 'MEAS?'])
    })
  })

  describe('Firmware Quirks', () => {
    it('should swap diode and continuity on firmware before 4.3.0', async () => {
      poller = createPoller({ idn: 'OWON,XDM1041,TEST0001,V4.2.1,2', functionId: '"DIOD"' })
      await poller.connect('/dev/ttyTEST0')

      expect(poller.getSnapshot().quirk?.policy).toBe('swap')
      expect(poller.getSnapshot().mode).toBe('continuity')
    })

    it('should report the ambiguity when configured for unknown firmware', async () => {
      poller = createPoller(
        { idn: 'OWON,XDM1041,TEST0001,unknown,2', functionId: '"CONT"' },
        { unknownFirmwarePolicy: 'report-ambiguous' }
      )
      const warnings: Error[] = []
      poller.on('warning', (warning: Error) => warnings.push(warning))

      await poller.connect('/dev/ttyTEST0')

      expect(poller.getSnapshot().mode).toBe('diodeContinuityAmbiguous')
      expect(warnings).toHaveLength(1)
      expect(warnings[0]).toBeInstanceOf(QuirkAmbiguousError)
    })

    it('should assume the quirk for unknown firmware by default', async () => {
      poller = createPoller({ idn: 'OWON,XDM1041,TEST0001,unknown,2', functionId: '"CONT"' })
      await poller.connect('/dev/ttyTEST0')

      expect(poller.getSnapshot().quirk?.firmwareUnknown).toBe(true)
      expect(poller.getSnapshot().mode).toBe('diode')
    })
  })

  describe('Recording', () => {
    it('should keep polling when the sink fails', async () => {
      const failingSink: RecordingSink = {
        record: () => Promise.reject(new Error('disk full')),
      }
      const session = new RecordingSession(failingSink, { mode: 'continuous', bufferDepth: 10 })
      const sinkErrors: SinkError[] = []
      session.on('error', (error: SinkError) => sinkErrors.push(error))
      session.start()

      await poller.connect('/dev/ttyTEST0')
      poller.attachRecording(session)

      await pollTimes(poller, 2)
      await session.flush()

      expect(poller.getState()).toBe('ready')
      expect(poller.getHealth().measurementsReceived).toBe(2)
      expect(sinkErrors).toHaveLength(2)
      expect(sinkErrors[0]).toBeInstanceOf(SinkError)
      expect(sinkErrors[0].message).toBe('Failed to write record 0: disk full')
      expect(session.getStats().failures).toBe(2)
    })

    it('should keep updating the snapshot after the sink starts failing', async () => {
      let writesLeft = 3
      const flakySink: RecordingSink = {
        record: () => {
          if (writesLeft === 0) {
            return Promise.reject(new Error('disk full'))
          }
          writesLeft--
          return Promise.resolve()
        },
      }
      const session = new RecordingSession(flakySink, { mode: 'continuous', bufferDepth: 10 })
      const sinkErrors: SinkError[] = []
      session.on('error', (error: SinkError) => sinkErrors.push(error))
      session.start()

      poller = createPoller({}, { functionPollEvery: 5 })
      await poller.connect('/dev/ttyTEST0')
      poller.attachRecording(session)

      await pollTimes(poller, 4)
      poller.instrument.state.measurement = '4.5'
      poller.instrument.state.functionId = '"VOLT AC"'
      await poller.poll()
      await session.flush()

      expect(poller.getState()).toBe('ready')
      expect(poller.getLatestMeasurement()?.value).toEqual({ kind: 'numeric', value: 4.5 })
      expect(poller.getSnapshot().mode).toBe('acv')
      expect(session.getStats().recordsWritten).toBe(3)
      expect(session.getStats().failures).toBe(2)
      expect(sinkErrors[0].recordIndex).toBe(3)
    })

    it('should capture the latest measurement on demand', async () => {
      const records: RecordingRecord[] = []
      const session = new RecordingSession(
        {
          record: async (record) => {
            records.push(record)
          },
        },
        { mode: 'manual', bufferDepth: 10 }
      )
      session.start()

      await poller.connect('/dev/ttyTEST0')
      expect(poller.captureNow()).toBeNull()

      poller.attachRecording(session)
      expect(poller.captureNow()).toBeNull()

      await pollTimes(poller, 3)
      const captured = poller.captureNow()
      await session.flush()

      expect(captured?.index).toBe(0)
      expect(captured?.value).toBe(1.2345)
      expect(records).toHaveLength(1)
    })
  })

  describe('Health', () => {
    it('should report connection details', async () => {
      await poller.connect('/dev/ttyTEST0')
      await poller.poll()

      const health = poller.getHealth()
      expect(health.connection).toBe('ready')
      expect(health.port).toBe('/dev/ttyTEST0')
      expect(health.model).toBe('XDM1041')
      expect(health.firmware).toBe('V4.3.0')
      expect(health.outstandingQuery).toBeNull()
      expect(health.queuedCommands).toBe(0)
      expect(health.measurementsReceived).toBe(1)
      expect(health.lastMeasurementAgeMs).toBeGreaterThanOrEqual(0)
    })
  })
})
