/**
 * Satellite Inventory — API Client
 *
 * Basic-auth GET requests against the Satellite v2 API.
 * Every response body is validated before it reaches the inventory code.
 */

import type { z } from 'zod'
import { SatelliteApiError, errorMessage } from '../errors.js'
import type { SatelliteConfig } from '../config/types.js'
import {
  HostSchema,
  HostgroupSchema,
  OrganizationSchema,
  listResponse,
} from './types.js'
import type { HostRecord, Hostgroup, Organization, SatelliteApi } from './types.js'

export type SatelliteClientOptions = {
  fetch?: typeof fetch
}

/** `Authorization` header value for user/password */
export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, 'utf-8').toString('base64')}`
}

export class SatelliteClient implements SatelliteApi {
  private readonly fetchImpl: typeof fetch
  private readonly authorization: string

  constructor(
    private readonly apiBase: string,
    credentials: Pick<SatelliteConfig, 'username' | 'password'>,
    options: SatelliteClientOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? fetch
    this.authorization = basicAuth(credentials.username, credentials.password)
  }

  /** Absolute URL for an API path such as `hosts` */
  url(path: string, params: Record<string, string | number> = {}): string {
    const url = new URL(path, this.apiBase)
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value))
    }
    return url.toString()
  }

  /**
   * GET `path` and validate the JSON body against `schema`.
   * Network errors, non-2xx statuses, non-JSON bodies and unexpected shapes
   * all surface as SatelliteApiError.
   */
  async getJson<T extends z.ZodTypeAny>(
    path: string,
    schema: T,
    params: Record<string, string | number> = {},
  ): Promise<z.infer<T>> {
    let response: Response
    try {
      response = await this.fetchImpl(this.url(path, params), {
        headers: {
          Authorization: this.authorization,
          Accept: 'application/json',
        },
      })
    } catch (err) {
      throw new SatelliteApiError(`GET ${path} failed: ${errorMessage(err)}`, path, undefined, err)
    }

    if (!response.ok) {
      throw new SatelliteApiError(`GET ${path} returned HTTP ${response.status}`, path, response.status)
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (err) {
      throw new SatelliteApiError(`GET ${path} returned invalid JSON: ${errorMessage(err)}`, path, response.status, err)
    }

    const result = schema.safeParse(body)
    if (!result.success) {
      const issue = result.error.issues[0]
      const where = issue?.path.length ? ` at ${issue.path.join('.')}` : ''
      throw new SatelliteApiError(
        `GET ${path} returned an unexpected body${where}: ${issue?.message ?? 'invalid'}`,
        path,
        response.status,
        result.error,
      )
    }
    return result.data
  }

  async findOrganization(name: string): Promise<Organization | null> {
    const { results } = await this.getJson('organizations', listResponse(OrganizationSchema), { search: name })
    return results.find((org) => org.name === name) ?? results[0] ?? null
  }

  async listHostgroups(organizationId: number): Promise<Hostgroup[]> {
    const { results } = await this.getJson('hostgroups', listResponse(HostgroupSchema), {
      organization_id: organizationId,
    })
    return results
  }

  async listHosts(organizationId: number): Promise<HostRecord[]> {
    const { results } = await this.getJson('hosts', listResponse(HostSchema), {
      organization_id: organizationId,
    })
    return results
  }
}
