import Conf, { type Schema } from 'conf'

import type { MultimeterConfig } from './multimeter-config'
import {
  createMultimeterConfig,
  MAX_BUFFER_DEPTH,
  SAMPLE_RATES,
  UNKNOWN_FIRMWARE_POLICIES,
  VALID_BAUD_RATES,
} from './multimeter-config'

/**
 * Persisted settings
 * Every key is optional; missing keys fall back to the defaults in DEFAULT_CONFIG
 */
export interface PersistedSettings {
  /**
   * Serial port used for the last successful connection
   */
  lastPort?: string
  pollIntervalMs?: number
  uiRefreshIntervalMs?: number
  readTimeoutMs?: number
  maxConsecutiveTimeouts?: number
  lockRemoteOnConnect?: boolean
  bufferDepth?: number
  functionPollEvery?: number
  unknownFirmwarePolicy?: MultimeterConfig['unknownFirmwarePolicy']
  sampleRate?: MultimeterConfig['sampleRate']
  beeperEnabled?: boolean
  continuityThreshold?: number
  diodeThreshold?: number
  baudRate?: number
}

const settingsSchema: Schema<PersistedSettings> = {
  lastPort: {
    type: 'string',
  },
  pollIntervalMs: {
    type: 'integer',
    minimum: 1,
  },
  uiRefreshIntervalMs: {
    type: 'integer',
    minimum: 1,
  },
  readTimeoutMs: {
    type: 'integer',
    minimum: 1,
  },
  maxConsecutiveTimeouts: {
    type: 'integer',
    minimum: 1,
  },
  lockRemoteOnConnect: {
    type: 'boolean',
  },
  bufferDepth: {
    type: 'integer',
    minimum: 1,
    maximum: MAX_BUFFER_DEPTH,
  },
  functionPollEvery: {
    type: 'integer',
    minimum: 1,
  },
  unknownFirmwarePolicy: {
    type: 'string',
    enum: [...UNKNOWN_FIRMWARE_POLICIES],
  },
  sampleRate: {
    type: 'string',
    enum: [...SAMPLE_RATES],
  },
  beeperEnabled: {
    type: 'boolean',
  },
  continuityThreshold: {
    type: 'number',
    minimum: 0,
  },
  diodeThreshold: {
    type: 'number',
    minimum: 0,
  },
  baudRate: {
    type: 'integer',
    enum: Array.from(VALID_BAUD_RATES),
  },
}

export interface ConfigStoreOptions {
  /**
   * Directory holding the settings file. Defaults to the OS config directory.
   */
  cwd?: string
  configName?: string
}

export type ConfigStore = Conf<PersistedSettings>

/**
 * Open (or create) the settings file.
 * @param options
 */
export function createConfigStore(options: ConfigStoreOptions = {}): ConfigStore {
  return new Conf<PersistedSettings>({
    projectName: 'scpi-meter-bridge',
    cwd: options.cwd,
    configName: options.configName ?? 'config',
    schema: settingsSchema,
  })
}

/**
 * Build a validated config from the persisted settings.
 * @param store
 */
export function loadMultimeterConfig(store: ConfigStore): MultimeterConfig {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  const { lastPort, ...overrides } = store.store
  return createMultimeterConfig(overrides)
}

/**
 *
 * @param store
 * @param config
 */
export function saveMultimeterConfig(store: ConfigStore, config: MultimeterConfig): void {
  store.set({ ...config })
}

/**
 *
 * @param store
 */
export function getLastPort(store: ConfigStore): string | null {
  return store.get('lastPort') ?? null
}

/**
 *
 * @param store
 * @param port
 */
export function setLastPort(store: ConfigStore, port: string): void {
  store.set('lastPort', port)
}
