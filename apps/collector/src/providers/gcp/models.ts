import type { ModelDescriptor } from '@cloudledger/db'

export type GcpInstanceRow = {
  project_id: string
  region: string
  zone: string
  instance_id: string
  name: string
  machine_type: string
  status: string
  network_ip: string | null
  subnet_project: string | null
  subnet_region: string | null
  subnet_name: string | null
  creation_timestamp: Date | null
}

export type GcpVpcRow = {
  project_id: string
  vpc_id: string
  name: string
  auto_create_subnetworks: boolean
  mtu: number | null
  routing_mode: string | null
  creation_timestamp: Date | null
}

export type GcpSubnetRow = {
  project_id: string
  subnet_id: string
  name: string
  region: string
  vpc_name: string
  ip_cidr_range: string
  gateway_address: string | null
  private_ip_google_access: boolean
  creation_timestamp: Date | null
}

export const GCP_INSTANCE_MODEL: ModelDescriptor<GcpInstanceRow> = {
  name: 'gcp:model:instance',
  table: 'gcp_instance',
  conflictColumns: ['project_id', 'instance_id'],
  updateColumns: [
    'region',
    'zone',
    'name',
    'machine_type',
    'status',
    'network_ip',
    'subnet_project',
    'subnet_region',
    'subnet_name',
    'creation_timestamp',
  ],
}

export const GCP_VPC_MODEL: ModelDescriptor<GcpVpcRow> = {
  name: 'gcp:model:vpc',
  table: 'gcp_vpc',
  conflictColumns: ['project_id', 'vpc_id'],
  updateColumns: ['name', 'auto_create_subnetworks', 'mtu', 'routing_mode', 'creation_timestamp'],
}

export const GCP_SUBNET_MODEL: ModelDescriptor<GcpSubnetRow> = {
  name: 'gcp:model:subnet',
  table: 'gcp_subnet',
  conflictColumns: ['project_id', 'subnet_id'],
  updateColumns: [
    'name',
    'region',
    'vpc_name',
    'ip_cidr_range',
    'gateway_address',
    'private_ip_google_access',
    'creation_timestamp',
  ],
}

export const GCP_LINK_SUBNET_TO_VPC_MODEL: ModelDescriptor = {
  name: 'gcp:model:link_subnet_to_vpc',
  table: 'gcp_link_subnet_to_vpc',
  conflictColumns: ['subnet_id', 'vpc_id'],
  updateColumns: [],
}

export const GCP_LINK_INSTANCE_TO_SUBNET_MODEL: ModelDescriptor = {
  name: 'gcp:model:link_instance_to_subnet',
  table: 'gcp_link_instance_to_subnet',
  conflictColumns: ['instance_id', 'subnet_id'],
  updateColumns: [],
}

export const GCP_MODELS: readonly ModelDescriptor[] = [
  GCP_INSTANCE_MODEL,
  GCP_VPC_MODEL,
  GCP_SUBNET_MODEL,
  GCP_LINK_SUBNET_TO_VPC_MODEL,
  GCP_LINK_INSTANCE_TO_SUBNET_MODEL,
]
