import type { HostRecord } from '../satellite/types.js'

/** Group name → host names, in the order the API listed them */
export type InventoryMapping = Record<string, string[]>

/** Host name → the record the API returned for it */
export type HostDetails = Record<string, HostRecord>

export type CachedInventory = {
  inventory: InventoryMapping
  hosts: HostDetails
}
