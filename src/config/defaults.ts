/**
 * Satellite Inventory — Config Defaults
 *
 * Only the optional keys have defaults; connection and cache settings must
 * come from the config file.
 */

export const CONFIG_ENV = 'SATELLITE_INVENTORY_CONFIG'

export const CONFIG_FILENAME = 'config.yaml'

export const API_PATH = 'api/v2/'

export const HOSTS_CACHE_FILENAME = 'satellite-inventory.cache'
export const INVENTORY_CACHE_FILENAME = 'satellite-inventory.index'

export const DEFAULT_GROUP_NAMES = {
  sanitize: false,
}

export const DEFAULT_LOG = false
