import { z } from 'zod'
import { DEFAULT_GROUP_NAMES, DEFAULT_LOG } from './defaults.js'

const nonEmpty = z.string().min(1)

export const SatelliteSchema = z.object({
  host: z.string().url(),
  username: nonEmpty,
  password: nonEmpty,
  organization: nonEmpty,
})

export const CacheSchema = z.object({
  path: nonEmpty,
  /** Seconds after which the cache is stale */
  max_age: z.number().int().min(0),
})

export const GroupNamesSchema = z.object({
  sanitize: z.boolean().default(DEFAULT_GROUP_NAMES.sanitize),
})

export const ConfigFileSchema = z.object({
  satellite: SatelliteSchema,
  cache: CacheSchema,
  group_names: GroupNamesSchema.default(DEFAULT_GROUP_NAMES),
  log: z.boolean().default(DEFAULT_LOG),
})
