import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createDebugClient, logPath } from './debug-client.js'
import { FakeSatelliteApi } from '../__tests__/fakes.js'

describe('logPath', () => {
  it('names the file after the UTC date', () => {
    expect(logPath('/logs', new Date('2026-03-04T23:10:00Z'))).toBe(join('/logs', 'debug-2026-03-04.log'))
  })
})

describe('createDebugClient', () => {
  let dir: string
  let api: FakeSatelliteApi

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'satinv-log-'))
    api = new FakeSatelliteApi()
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  function readLog(): string {
    return readFileSync(logPath(dir), 'utf-8')
  }

  it('passes results through and logs request and response', async () => {
    api.hosts = [{ name: 'web01', hostgroup_name: 'web' }]
    const client = createDebugClient(api, dir)

    expect(await client.listHosts(3)).toEqual(api.hosts)

    const log = readLog()
    expect(log).toContain('] REQUEST #1 listHosts\n')
    expect(log).toContain('] RESPONSE #1 listHosts\n')
    expect(log).toContain('"organizationId": 3')
    expect(log).toContain('"count": 1')
  })

  it('numbers calls in order', async () => {
    const client = createDebugClient(api, dir)
    await client.findOrganization('Example Org')
    await client.listHostgroups(3)

    const log = readLog()
    expect(log).toContain('REQUEST #1 findOrganization')
    expect(log).toContain('"found": true')
    expect(log).toContain('REQUEST #2 listHostgroups')
  })

  it('logs and rethrows failures', async () => {
    api.hostsError = new Error('HTTP 500')
    const client = createDebugClient(api, dir)

    await expect(client.listHosts(3)).rejects.toThrow('HTTP 500')
    expect(readLog()).toContain('"error": "HTTP 500"')
  })
})
