export { ROOT_CATEGORY, configureLogger, getLogger, resetLogger } from './logger.js'
export type { Logger } from './logger.js'
