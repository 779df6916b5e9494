/**
 * Satellite Inventory — Request Log
 *
 * Wraps a SatelliteApi to log every call and its outcome
 * to a dated log file. Credentials never reach the log.
 */

import { mkdirSync, appendFileSync } from 'node:fs'
import { join } from 'node:path'
import { inventoryHome } from '../config/paths.js'
import { errorMessage } from '../errors.js'
import type { SatelliteApi } from './types.js'

export const LOG_DIR = inventoryHome('logs')

export function logPath(dir: string, now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10) // YYYY-MM-DD
  return join(dir, `debug-${date}.log`)
}

function writeLog(dir: string, label: string, data: unknown) {
  mkdirSync(dir, { recursive: true })
  const now = new Date()
  const separator = '-'.repeat(80)
  const content = `\n${separator}\n[${now.toISOString()}] ${label}\n${separator}\n${JSON.stringify(data, null, 2)}\n`
  appendFileSync(logPath(dir, now), content, 'utf-8')
}

export function createDebugClient(inner: SatelliteApi, dir: string = LOG_DIR): SatelliteApi {
  let callCount = 0

  async function logged<T>(
    call: string,
    args: Record<string, unknown>,
    run: () => Promise<T>,
    summarize: (result: T) => Record<string, unknown>,
  ): Promise<T> {
    callCount++
    const callId = callCount
    const started = Date.now()

    writeLog(dir, `REQUEST #${callId} ${call}`, args)

    try {
      const result = await run()
      writeLog(dir, `RESPONSE #${callId} ${call}`, { ...summarize(result), elapsedMs: Date.now() - started })
      return result
    } catch (err) {
      writeLog(dir, `ERROR #${callId} ${call}`, { error: errorMessage(err), elapsedMs: Date.now() - started })
      throw err
    }
  }

  return {
    findOrganization(name) {
      return logged('findOrganization', { name }, () => inner.findOrganization(name), (org) => ({
        found: org !== null,
        id: org?.id ?? null,
      }))
    },

    listHostgroups(organizationId) {
      return logged('listHostgroups', { organizationId }, () => inner.listHostgroups(organizationId), (groups) => ({
        count: groups.length,
      }))
    },

    listHosts(organizationId) {
      return logged('listHosts', { organizationId }, () => inner.listHosts(organizationId), (hosts) => ({
        count: hosts.length,
      }))
    },
  }
}
