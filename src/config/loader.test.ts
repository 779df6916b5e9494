import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join, resolve } from 'node:path'
import { apiBaseUrl, loadConfig, parseConfig, resolveConfigPath } from './loader.js'
import { inventoryHome } from './paths.js'
import { ConfigError } from '../errors.js'

const VALID = `
satellite:
  host: https://satellite.test/
  username: admin
  password: test-secret
  organization: Example Org
cache:
  path: /var/cache/satellite-inventory
  max_age: 300
`

describe('resolveConfigPath', () => {
  it('prefers the explicit path', () => {
    expect(resolveConfigPath('/etc/inv.yaml', { SATELLITE_INVENTORY_CONFIG: '/tmp/other.yaml' })).toBe('/etc/inv.yaml')
  })

  it('falls back to the environment variable', () => {
    expect(resolveConfigPath(undefined, { SATELLITE_INVENTORY_CONFIG: '/tmp/other.yaml' })).toBe('/tmp/other.yaml')
  })

  it('defaults to the home directory', () => {
    expect(resolveConfigPath(undefined, {})).toBe(inventoryHome('config.yaml'))
  })
})

describe('apiBaseUrl', () => {
  it('appends the v2 prefix once', () => {
    expect(apiBaseUrl('https://sat.test')).toBe('https://sat.test/api/v2/')
    expect(apiBaseUrl('https://sat.test//')).toBe('https://sat.test/api/v2/')
  })
})

describe('parseConfig', () => {
  it('derives API base and cache files', () => {
    const config = parseConfig(VALID, 'inline')
    expect(config.apiBase).toBe('https://satellite.test/api/v2/')
    expect(config.satellite.organization).toBe('Example Org')
    expect(config.cache).toEqual({
      maxAge: 300,
      hostsFile: resolve('/var/cache/satellite-inventory', 'satellite-inventory.cache'),
      inventoryFile: resolve('/var/cache/satellite-inventory', 'satellite-inventory.index'),
    })
  })

  it('applies defaults for optional keys', () => {
    const config = parseConfig(VALID, 'inline')
    expect(config.sanitizeGroupNames).toBe(false)
    expect(config.log).toBe(false)
  })

  it('reads optional keys', () => {
    const config = parseConfig(`${VALID}group_names:\n  sanitize: true\nlog: true\n`, 'inline')
    expect(config.sanitizeGroupNames).toBe(true)
    expect(config.log).toBe(true)
  })

  it('names a missing key', () => {
    const raw = VALID.replace('  password: test-secret\n', '')
    expect(() => parseConfig(raw, 'inline')).toThrow('Invalid config inline: satellite.password: Required')
  })

  it('rejects a fractional max_age', () => {
    const raw = VALID.replace('max_age: 300', 'max_age: 1.5')
    expect(() => parseConfig(raw, 'inline')).toThrow(/cache\.max_age/)
  })

  it('rejects a host that is not a URL', () => {
    const raw = VALID.replace('https://satellite.test/', 'satellite')
    expect(() => parseConfig(raw, 'inline')).toThrow(/satellite\.host/)
  })

  it('rejects an empty document', () => {
    expect(() => parseConfig('', 'inline')).toThrow(ConfigError)
  })

  it('rejects malformed YAML', () => {
    expect(() => parseConfig('satellite: [unclosed', 'inline')).toThrow(/^Malformed config inline/)
  })
})

describe('loadConfig', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'satinv-config-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('reads the file at the given path', () => {
    const file = join(dir, 'config.yaml')
    writeFileSync(file, VALID)
    const config = loadConfig(file)
    expect(config.source).toBe(file)
    expect(config.satellite.username).toBe('admin')
  })

  it('fails when the file is missing', () => {
    const file = join(dir, 'missing.yaml')
    expect(() => loadConfig(file)).toThrow(`Config file not found: ${file}`)
  })
})
