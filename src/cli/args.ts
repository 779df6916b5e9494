/**
 * Satellite Inventory — Command Line
 *
 * The flags Ansible passes to a dynamic inventory, plus --config.
 */

import { UsageError } from '../errors.js'

export type CliArgs = {
  list: boolean
  host?: string
  refreshCache: boolean
  config?: string
  help: boolean
}

export const USAGE = `Usage: satellite-inventory [--list] [--host NAME] [--refresh-cache] [--config PATH]

Produce an Ansible inventory from Satellite.

  --list           List groups and their hosts (default)
  --host NAME      Print the variables for one host
  --refresh-cache  Query the API even if the cache is still fresh
  --config PATH    Config file (default: $SATELLITE_INVENTORY_CONFIG or ~/.satellite-inventory/config.yaml)
  -h, --help       Show this help`

/** Value flags accept `--flag value` and `--flag=value` */
const VALUE_FLAGS = ['--host', '--config'] as const
type ValueFlag = (typeof VALUE_FLAGS)[number]

function isValueFlag(flag: string): flag is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(flag)
}

/** Parse arguments after the script path */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { list: true, refreshCache: false, help: false }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    const eq = arg.indexOf('=')
    const flag = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg

    if (isValueFlag(flag)) {
      let value: string | undefined
      if (flag !== arg) {
        value = arg.slice(eq + 1)
      } else {
        const next = argv[i + 1]
        if (next !== undefined && !next.startsWith('--')) {
          value = next
          i++
        }
      }
      if (!value) throw new UsageError(`${flag} requires a value`)

      if (flag === '--host') args.host = value
      else args.config = value
      continue
    }

    switch (arg) {
      case '--list':
        args.list = true
        break
      case '--refresh-cache':
        args.refreshCache = true
        break
      case '-h':
      case '--help':
        args.help = true
        break
      default:
        throw new UsageError(`Unknown argument: ${arg}`)
    }
  }

  return args
}
