/**
 * GCP adapter contract.
 *
 * The SDK-backed implementation is loaded at start-up from the module named
 * in the inventory config. It authenticates one client per scope and exposes
 * paged listings; API failures carrying an HTTP status must be thrown as (or
 * wrap) ProviderApiError with provider 'gcp'.
 */

import type { ClientScope } from '../../core/scope'

export interface GcpInstance {
  id: string
  name: string
  zone: string
  machineType: string
  status: string
  /** Self link of the primary network interface's subnetwork */
  subnetwork?: string
  networkIP?: string
  creationTimestamp?: string
}

export interface GcpNetwork {
  id: string
  name: string
  autoCreateSubnetworks: boolean
  mtu?: number
  routingMode?: string
  creationTimestamp?: string
}

export interface GcpSubnetwork {
  id: string
  name: string
  region: string
  ipCidrRange: string
  gatewayAddress?: string
  privateIpGoogleAccess?: boolean
  creationTimestamp?: string
}

export interface GcpClient {
  /** Instances of the client's project, restricted to `region` when given */
  listInstances(region?: string): AsyncIterable<readonly GcpInstance[]>
  listNetworks(): AsyncIterable<readonly GcpNetwork[]>
  /** Subnetworks of `network`, restricted to `region` when given */
  listSubnetworks(network: string, region?: string): AsyncIterable<readonly GcpSubnetwork[]>
}

export interface GcpAdapter {
  authenticate(scope: ClientScope): Promise<GcpClient>
}

export function isGcpAdapter(value: unknown): value is GcpAdapter {
  return (
    typeof value === 'object' &&
    value !== null &&
    'authenticate' in value &&
    typeof value.authenticate === 'function'
  )
}

/** 404 is the only permanent GCP status. */
export const GCP_PERMANENT_STATUS_CODES: readonly number[] = [404]

const SUBNETWORK_LINK = /projects\/([^/]+)\/regions\/([^/]+)\/subnetworks\/([^/]+)$/

export interface SubnetworkRef {
  project: string
  region: string
  name: string
}

export function parseSubnetworkLink(link: string | undefined): SubnetworkRef | undefined {
  const match = link ? SUBNETWORK_LINK.exec(link) : null
  if (!match) return undefined
  return { project: match[1], region: match[2], name: match[3] }
}

/**
 * Region of a zone name or zone URL: everything before the last `-`.
 * Returns '' when the zone carries no region part.
 */
export function regionFromZone(zone: string): string {
  const name = zone.slice(zone.lastIndexOf('/') + 1)
  const dash = name.lastIndexOf('-')
  return dash === -1 ? '' : name.slice(0, dash)
}
