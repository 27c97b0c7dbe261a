/**
 * pypack-policy - Main module exports
 * Public API surface for the packaging policy toolkit
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'

// Resource model
export * from './modules/resources/index.js'

// Licensing
export * from './modules/licensing/index.js'

// Packaging policy
export * from './modules/packaging-policy/index.js'

// Distribution manifest
export * from './modules/distribution-manifest/index.js'
