import type { ModelDescriptor } from '@cloudledger/db'
import type { CollectorFactory } from '../core/collector'
import type { LinkAllFactory } from '../core/linker'
import type { TaskFactory } from '../core/task'

/** Everything one provider contributes to the registration table. */
export interface ProviderTasks {
  provider: string
  collectors: readonly CollectorFactory[]
  collectAll: TaskFactory
  linkAll: LinkAllFactory
  models: readonly ModelDescriptor[]
}
