import { createLogger } from '@cloudledger/logger'

export const logger = createLogger('collector')

export const loggers = {
  worker: logger.child('worker'),
  tasks: logger.child('tasks'),
  scheduler: logger.child('scheduler'),
  bootstrap: logger.child('bootstrap'),
  metrics: logger.child('metrics'),
  redis: logger.child('redis'),
  db: logger.child('db'),
}
