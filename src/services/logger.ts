import log from 'electron-log/node'
import * as os from 'os'
import * as path from 'path'

// Keep test runs off the filesystem; console output still goes through the same logger
const underTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined

log.transports.console.level = underTest ? 'warn' : 'info'
log.transports.file.level = underTest ? false : 'debug'

log.transports.file.resolvePathFn = () =>
  path.join(process.env.SCPI_METER_LOG_DIR ?? path.join(os.homedir(), '.scpi-meter-bridge', 'logs'), 'main.log')

log.variables.process = 'meter'

export default log
