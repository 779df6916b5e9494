/**
 * Satellite Inventory — Errors
 *
 * Every failure the entry point knows how to report.
 */

export class InventoryError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'InventoryError'
  }
}

/** Config file missing, unreadable, or missing a required key */
export class ConfigError extends InventoryError {
  constructor(
    message: string,
    public readonly file: string,
    cause?: unknown,
  ) {
    super(message, cause)
    this.name = 'ConfigError'
  }
}

export class UsageError extends InventoryError {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export class OrganizationNotFoundError extends InventoryError {
  constructor(public readonly organization: string) {
    super(`Organization '${organization}' not found`)
    this.name = 'OrganizationNotFoundError'
  }
}

/** Remote call failed: network, non-2xx, or a body that is not the expected JSON */
export class SatelliteApiError extends InventoryError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, cause)
    this.name = 'SatelliteApiError'
  }
}

export class CacheError extends InventoryError {
  constructor(
    message: string,
    public readonly file: string,
    cause?: unknown,
  ) {
    super(message, cause)
    this.name = 'CacheError'
  }
}

/** Pull a printable message out of anything thrown */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
