/**
 * Satellite Inventory — Remote Types
 *
 * Only `name` and `hostgroup_name` of a host are interpreted; everything
 * else the API returns rides along untouched into the host-detail cache.
 */

import { z } from 'zod'

export const OrganizationSchema = z.object({
  id: z.number(),
  name: z.string(),
}).passthrough()

export const HostgroupSchema = z.object({
  id: z.number(),
  name: z.string(),
}).passthrough()

export const HostSchema = z.object({
  name: z.string(),
  hostgroup_name: z.string().nullable().optional(),
}).passthrough()

/** Every listing endpoint wraps its rows in `results` */
export function listResponse<T extends z.ZodTypeAny>(item: T) {
  return z.object({ results: z.array(item) })
}

export type Organization = z.infer<typeof OrganizationSchema>
export type Hostgroup = z.infer<typeof HostgroupSchema>
export type HostRecord = z.infer<typeof HostSchema>

/** The three calls the inventory needs from the management API */
export interface SatelliteApi {
  /** First organization matching `name`, preferring an exact name match */
  findOrganization(name: string): Promise<Organization | null>
  listHostgroups(organizationId: number): Promise<Hostgroup[]>
  listHosts(organizationId: number): Promise<HostRecord[]>
}
