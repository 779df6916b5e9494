/**
 * Where the program keeps its own files when the config does not say:
 * config.yaml and the logs/ directory of the request log. On Windows the
 * folder lives under %APPDATA%, elsewhere it is ~/.satellite-inventory.
 */

import { join } from 'node:path'
import { homedir } from 'node:os'

function baseDir(): string {
  if (process.platform !== 'win32') return join(homedir(), '.satellite-inventory')
  const appData = process.env.APPDATA || join(homedir(), 'AppData', 'Roaming')
  return join(appData, 'satellite-inventory')
}

/** Path under the home folder, e.g. `inventoryHome('logs')` */
export function inventoryHome(...segments: string[]): string {
  return join(baseDir(), ...segments)
}
