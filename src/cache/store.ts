/**
 * Satellite Inventory — Cache Store
 *
 * Two JSON documents on disk:
 *   hosts file      host name → full host record
 *   inventory file  group name → host names
 *
 * Freshness is judged by the inventory file's mtime. Writes go through a
 * temp file and a rename so a concurrent reader sees the old or the
 * new document, never half of one.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, statSync, writeFileSync } from 'node:fs'
import { basename, dirname, join } from 'node:path'
import { z } from 'zod'
import { CacheError, errorMessage } from '../errors.js'
import { formatJson } from '../output/json.js'
import { HostSchema } from '../satellite/types.js'
import type { CachedInventory, HostDetails, InventoryMapping } from './types.js'

export const InventoryMappingSchema = z.record(z.string(), z.array(z.string()))
export const HostDetailsSchema = z.record(z.string(), HostSchema)

export type CacheFiles = {
  hostsFile: string
  inventoryFile: string
}

let tempCounter = 0

export class CacheStore {
  constructor(
    readonly files: CacheFiles,
    /** Seconds */
    readonly maxAge: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** Both files present and the inventory file younger than maxAge */
  isValid(): boolean {
    const inventory = statSync(this.files.inventoryFile, { throwIfNoEntry: false })
    if (!inventory?.isFile()) return false
    if (inventory.mtimeMs + this.maxAge * 1000 <= this.now()) return false

    const hosts = statSync(this.files.hostsFile, { throwIfNoEntry: false })
    return hosts?.isFile() ?? false
  }

  load(): CachedInventory {
    return {
      inventory: readJson(this.files.inventoryFile, InventoryMappingSchema),
      hosts: readJson(this.files.hostsFile, HostDetailsSchema),
    }
  }

  /** Replace both files; the inventory last, since its mtime marks freshness */
  save(hosts: HostDetails, inventory: InventoryMapping): void {
    writeJsonAtomic(this.files.hostsFile, hosts)
    writeJsonAtomic(this.files.inventoryFile, inventory)
  }
}

function readJson<T extends z.ZodTypeAny>(file: string, schema: T): z.infer<T> {
  if (!existsSync(file)) {
    throw new CacheError(`Cache file not found: ${file}`, file)
  }

  let data: unknown
  try {
    data = JSON.parse(readFileSync(file, 'utf-8'))
  } catch (err) {
    throw new CacheError(`Cannot read cache file ${file}: ${errorMessage(err)}`, file, err)
  }

  const result = schema.safeParse(data)
  if (!result.success) {
    throw new CacheError(`Cache file ${file} has an unexpected shape`, file, result.error)
  }
  return result.data
}

function writeJsonAtomic(file: string, data: unknown): void {
  const dir = dirname(file)
  const temp = join(dir, `.${basename(file)}.${process.pid}.${++tempCounter}.tmp`)

  try {
    mkdirSync(dir, { recursive: true })
  } catch (err) {
    throw new CacheError(`Cannot create cache directory ${dir}: ${errorMessage(err)}`, file, err)
  }

  try {
    writeFileSync(temp, `${formatJson(data)}\n`, 'utf-8')
    renameSync(temp, file)
  } catch (err) {
    rmSync(temp, { force: true })
    throw new CacheError(`Cannot write cache file ${file}: ${errorMessage(err)}`, file, err)
  }
}
