/**
 * Satellite Inventory — Query Dispatcher
 *
 * Decides between the cache and a refresh, then renders either the
 * whole inventory or one host's record.
 */

import type { CachedInventory, HostDetails } from '../cache/types.js'
import type { InventoryContext } from '../context.js'
import { formatJson } from '../output/json.js'
import type { HostRecord } from '../satellite/types.js'
import { InventoryBuilder } from './builder.js'

export type Query = {
  /** Set for `--host NAME`; otherwise the full inventory is listed */
  host?: string
  refreshCache: boolean
}

function lookup(hosts: HostDetails, name: string): HostRecord | undefined {
  return Object.hasOwn(hosts, name) ? hosts[name] : undefined
}

/** Run one query and return the JSON text to print */
export async function runQuery(ctx: InventoryContext, query: Query): Promise<string> {
  const builder = new InventoryBuilder(ctx)

  let data: CachedInventory
  if (query.refreshCache || !ctx.store.isValid()) {
    data = await builder.refresh()
  } else {
    data = ctx.store.load()
  }

  if (query.host === undefined) {
    return formatJson(data.inventory)
  }

  let record = lookup(data.hosts, query.host)
  if (!record) {
    // Host may be new since the cache was written
    data = await builder.refresh()
    record = lookup(data.hosts, query.host)
  }

  // Still missing: presumed deleted upstream
  return formatJson(record ?? {})
}
