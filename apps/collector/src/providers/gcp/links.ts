import { createLinkAllTask, defineLink, linkMetric, type LinkAllFactory } from '../../core/linker'
import { GCP_PERMANENT_STATUS_CODES } from './adapter'
import { GCP_TASKS } from './collectors'
import {
  GCP_INSTANCE_MODEL,
  GCP_LINK_INSTANCE_TO_SUBNET_MODEL,
  GCP_LINK_SUBNET_TO_VPC_MODEL,
  GCP_SUBNET_MODEL,
  GCP_VPC_MODEL,
} from './models'

export const linkSubnetToVpc = defineLink({
  name: 'subnet_to_vpc',
  model: GCP_LINK_SUBNET_TO_VPC_MODEL,
  join: {
    child: GCP_SUBNET_MODEL.table,
    parent: GCP_VPC_MODEL.table,
    on: [
      ['project_id', 'project_id'],
      ['vpc_name', 'name'],
    ],
  },
  childColumn: 'subnet_id',
  parentColumn: 'vpc_id',
})

export const linkInstanceToSubnet = defineLink({
  name: 'instance_to_subnet',
  model: GCP_LINK_INSTANCE_TO_SUBNET_MODEL,
  join: {
    child: GCP_INSTANCE_MODEL.table,
    parent: GCP_SUBNET_MODEL.table,
    on: [
      ['subnet_project', 'project_id'],
      ['subnet_region', 'region'],
      ['subnet_name', 'name'],
    ],
  },
  childColumn: 'instance_id',
  parentColumn: 'subnet_id',
})

export const GCP_LINKS = [linkSubnetToVpc, linkInstanceToSubnet]

export function createGcpLinkAllTask(): LinkAllFactory {
  return createLinkAllTask(GCP_TASKS.LINK_ALL, GCP_LINKS, linkMetric('gcp'), GCP_PERMANENT_STATUS_CODES)
}
