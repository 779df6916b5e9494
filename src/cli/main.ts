/**
 * Satellite Inventory — Run
 *
 * Parse flags → load config → resolve organization → answer the query.
 * Returns the process exit code; stdout carries only the JSON result.
 */

import { loadConfig, resolveConfigPath } from '../config/loader.js'
import { createContext } from '../context.js'
import type { ContextOptions } from '../context.js'
import { errorMessage } from '../errors.js'
import { runQuery } from '../inventory/dispatcher.js'
import { LOG_DIR } from '../satellite/debug-client.js'
import { parseArgs, USAGE } from './args.js'

export type RunOptions = ContextOptions & {
  env?: NodeJS.ProcessEnv
  stdout?: (text: string) => void
  stderr?: (text: string) => void
  /** Colour the error line */
  color?: boolean
}

const RED = '\x1b[38;5;196m'
const RESET = '\x1b[0m'

export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const stdout = options.stdout ?? ((text: string) => { process.stdout.write(text) })
  const stderr = options.stderr ?? ((text: string) => { process.stderr.write(text) })

  try {
    const args = parseArgs(argv)
    if (args.help) {
      stdout(`${USAGE}\n`)
      return 0
    }

    const config = loadConfig(resolveConfigPath(args.config, options.env))
    if (config.log) {
      stderr(`📝 Logging to ${options.logDir ?? LOG_DIR}\n`)
    }

    const ctx = await createContext(config, options)
    const output = await runQuery(ctx, { host: args.host, refreshCache: args.refreshCache })
    stdout(`${output}\n`)
    return 0
  } catch (err) {
    const line = `error: ${errorMessage(err)}`
    stderr(options.color ? `${RED}${line}${RESET}\n` : `${line}\n`)
    return 1
  }
}
