/**
 * Packaging policy module — barrel export.
 *
 * Public API:
 *  - ResourcesPolicy type with parse/format
 *  - ExtensionModuleFilter type with parse/format
 *  - PackagingPolicy aggregate (resource filter + extension resolution)
 *  - PackagingPolicyConfig schema and loader
 */

export type { ResourcesPolicy } from './resources-policy.js'
export {
  inMemoryOnly,
  filesystemRelativeOnly,
  preferInMemoryFallbackFilesystemRelative,
  parseResourcesPolicy,
  formatResourcesPolicy,
  resourcesPoliciesEqual,
} from './resources-policy.js'

export type { ExtensionModuleFilter } from './extension-module-filter.js'
export {
  EXTENSION_MODULE_FILTERS,
  parseExtensionModuleFilter,
  formatExtensionModuleFilter,
} from './extension-module-filter.js'

export { PackagingPolicy, isNonCopyleftExtension } from './packaging-policy.js'

export type { PackagingPolicyConfig, PolicyConfigFormat } from './policy-config.js'
export {
  PackagingPolicyConfigSchema,
  packagingPolicyFromConfig,
  parsePackagingPolicyConfig,
  loadPackagingPolicy,
} from './policy-config.js'
