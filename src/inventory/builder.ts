/**
 * Satellite Inventory — Inventory Builder
 *
 * Pulls hostgroups and hosts for the organization, groups host names
 * by hostgroup, and writes both cache files.
 */

import type { CachedInventory, HostDetails, InventoryMapping } from '../cache/types.js'
import type { InventoryContext } from '../context.js'
import type { HostRecord } from '../satellite/types.js'

/** Group for hosts that belong to no hostgroup */
export const UNGROUPED = 'ungrouped'

/** Replace characters Ansible rejects in group names with underscores */
export function toSafe(word: string): string {
  return word.replace(/[^A-Za-z0-9-]/g, '_')
}

export type GroupOptions = {
  sanitize?: boolean
}

/** Build both mappings from a host listing, keeping API order */
export function groupHosts(records: HostRecord[], options: GroupOptions = {}): CachedInventory {
  const groups = new Map<string, string[]>()
  const details = new Map<string, HostRecord>()

  for (const record of records) {
    const raw = record.hostgroup_name || UNGROUPED
    const group = options.sanitize ? toSafe(raw) : raw

    const members = groups.get(group)
    if (members) members.push(record.name)
    else groups.set(group, [record.name])

    details.set(record.name, record)
  }

  const inventory: InventoryMapping = Object.fromEntries(groups)
  const hosts: HostDetails = Object.fromEntries(details)
  return { inventory, hosts }
}

export class InventoryBuilder {
  constructor(private readonly ctx: InventoryContext) {}

  /** Fetch everything from the API and replace the cache. Nothing is written if a call fails. */
  async refresh(): Promise<CachedInventory> {
    const { api, organization, store, config } = this.ctx

    // Hostgroups are only fetched; hosts carry their hostgroup name
    await api.listHostgroups(organization.id)
    const records = await api.listHosts(organization.id)

    const result = groupHosts(records, { sanitize: config.sanitizeGroupNames })
    store.save(result.hosts, result.inventory)
    return result
  }
}
