export * from './types/multimeter'

export * from './services/config-store'
export * from './services/csv-recording-sink'
export * from './services/device-state'
export * from './services/firmware-quirks'
export { default as log } from './services/logger'
export * from './services/multimeter-config'
export * from './services/multimeter-poller'
export * from './services/recording-session'
export * from './services/scpi-protocol'
export * from './services/scpi-response-parser'
export * from './services/serial-transport'

export * from './stores/multimeter'
export * from './stores/multimeter-common'
