/**
 * PackagingPolicy — decides which Python resources go into a built binary.
 *
 * A policy is built once (defaults plus setters, or loaded from a config file
 * via policy-config.ts), then consulted read-only:
 *  - filterPythonResource() answers per-resource inclusion
 *  - resolvePythonExtensionModules() picks extension module variants for a target
 *
 * Both are synchronous and never mutate the policy or their inputs.
 */

import { createLogger } from '../../utils/logger.js'
import { isNonCopyleftLicense } from '../licensing/licensing.js'
import type { ExtensionModuleVariants } from '../resources/extension-module-variants.js'
import {
  isMinimallyRequired,
  requiresLibraries,
  type ExtensionModule,
  type PythonResource,
} from '../resources/types.js'
import type { ExtensionModuleFilter } from './extension-module-filter.js'
import { formatResourcesPolicy, inMemoryOnly, type ResourcesPolicy } from './resources-policy.js'
import type { PackagingPolicyConfig } from './policy-config.js'

const logger = createLogger('packaging-policy')

// ---------------------------------------------------------------------------
// License admission
// ---------------------------------------------------------------------------

/**
 * Whether an extension module variant is acceptable under the `no-gpl` filter.
 *
 * First match wins:
 *  1. links no libraries → admitted
 *  2. explicitly public domain → admitted, whatever licenses are listed
 *  3. has a license list → admitted iff every license is non-copyleft
 *  4. no license information → rejected
 */
export function isNonCopyleftExtension(extension: ExtensionModule): boolean {
  if (extension.linkLibraries.length === 0) {
    return true
  }
  if (extension.licensePublicDomain === true) {
    return true
  }
  if (extension.licenses !== undefined) {
    return extension.licenses.every((license) => isNonCopyleftLicense(license))
  }
  // Unknown licensing is presumed copyleft.
  return false
}

// ---------------------------------------------------------------------------
// PackagingPolicy
// ---------------------------------------------------------------------------

export class PackagingPolicy {
  /** Which extension modules should be included */
  private _extensionModuleFilter: ExtensionModuleFilter = 'all'

  /** Extension name → preferred variant name */
  private readonly _preferredExtensionModuleVariants = new Map<string, string>()

  /** Where resources should be packaged by default */
  private _resourcesPolicy: ResourcesPolicy = inMemoryOnly()

  private _includeDistributionSources = true
  private _includeDistributionResources = false
  private _includeTest = false

  /** Target triple → extensions known not to work there */
  private readonly _brokenExtensions = new Map<string, string[]>()

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  getExtensionModuleFilter(): ExtensionModuleFilter {
    return this._extensionModuleFilter
  }

  setExtensionModuleFilter(filter: ExtensionModuleFilter): void {
    this._extensionModuleFilter = filter
  }

  getPreferredExtensionModuleVariants(): ReadonlyMap<string, string> {
    return this._preferredExtensionModuleVariants
  }

  /**
   * Denote the preferred variant for an extension module.
   *
   * When several variants of `extension` are eligible, the one named
   * `variant` is chosen if present. Replaces any earlier preference.
   */
  setPreferredExtensionModuleVariant(extension: string, variant: string): void {
    this._preferredExtensionModuleVariants.set(extension, variant)
  }

  getResourcesPolicy(): ResourcesPolicy {
    return this._resourcesPolicy
  }

  setResourcesPolicy(policy: ResourcesPolicy): void {
    this._resourcesPolicy = policy
  }

  getIncludeDistributionSources(): boolean {
    return this._includeDistributionSources
  }

  /** Set whether module source from the Python distribution is packaged */
  setIncludeDistributionSources(include: boolean): void {
    this._includeDistributionSources = include
  }

  getIncludeDistributionResources(): boolean {
    return this._includeDistributionResources
  }

  /** Set whether non-code package resources from the distribution are packaged */
  setIncludeDistributionResources(include: boolean): void {
    this._includeDistributionResources = include
  }

  getIncludeTest(): boolean {
    return this._includeTest
  }

  /** Set whether modules and resources that only exist for tests are packaged */
  setIncludeTest(include: boolean): void {
    this._includeTest = include
  }

  /**
   * Mark an extension as broken on a target platform. It will never be
   * resolved for that target, whatever the filter.
   */
  registerBrokenExtension(targetTriple: string, extension: string): void {
    const existing = this._brokenExtensions.get(targetTriple)
    if (existing === undefined) {
      this._brokenExtensions.set(targetTriple, [extension])
    } else {
      existing.push(extension)
    }
  }

  getBrokenExtensions(targetTriple: string): readonly string[] {
    return this._brokenExtensions.get(targetTriple) ?? []
  }

  isBrokenExtension(targetTriple: string, extension: string): boolean {
    return this.getBrokenExtensions(targetTriple).includes(extension)
  }

  // -------------------------------------------------------------------------
  // Resource filtering
  // -------------------------------------------------------------------------

  /**
   * Determine whether a resource meets the inclusion requirements of this policy.
   *
   * Extension modules are always rejected here: they are selected per group
   * by resolvePythonExtensionModules().
   */
  filterPythonResource(resource: PythonResource): boolean {
    switch (resource.kind) {
      case 'module-source':
        if (!this._includeTest && resource.module.isTest) {
          return false
        }
        return this._includeDistributionSources
      case 'module-bytecode-request':
        return this._includeTest || !resource.module.isTest
      case 'module-bytecode':
        return false
      case 'resource':
        if (!this._includeDistributionResources) {
          return false
        }
        return this._includeTest || !resource.resource.isTest
      case 'distribution-resource':
      case 'extension-module-dynamic-library':
      case 'extension-module-statically-linked':
      case 'path-extension':
      case 'egg-file':
        return false
    }
  }

  // -------------------------------------------------------------------------
  // Extension module resolution
  // -------------------------------------------------------------------------

  /**
   * Resolve the extension module variants compliant with this policy.
   *
   * Output follows input group order. Per group: broken extensions for
   * `targetTriple` are skipped; a minimally required variant is always added
   * first; then the filter may add one more variant. Under `all` this second
   * entry can be the same variant as the first; callers receive both.
   */
  resolvePythonExtensionModules(
    variantGroups: Iterable<ExtensionModuleVariants>,
    targetTriple: string,
  ): ExtensionModule[] {
    const preferred = this._preferredExtensionModuleVariants
    const resolved: ExtensionModule[] = []

    for (const variants of variantGroups) {
      if (variants.isEmpty()) {
        logger.debug({ targetTriple }, 'Skipping extension module group with no variants')
        continue
      }

      const name = variants.name

      if (this.isBrokenExtension(targetTriple, name)) {
        logger.debug({ extension: name, targetTriple }, 'Extension is broken on target, skipping')
        continue
      }

      // Things don't work without minimally required extensions.
      const minimal = variants.filter(isMinimallyRequired)
      if (!minimal.isEmpty()) {
        const chosen = minimal.chooseVariant(preferred)
        logger.debug({ extension: name, variant: chosen.variant }, 'Adding minimally required extension')
        resolved.push(chosen)
      }

      const candidates = this._candidatesForFilter(variants)
      if (candidates === null) {
        continue
      }

      if (candidates.isEmpty()) {
        logger.debug(
          { extension: name, filter: this._extensionModuleFilter },
          'No extension variant satisfies filter',
        )
        continue
      }

      const chosen = candidates.chooseVariant(preferred)
      logger.debug(
        { extension: name, variant: chosen.variant, filter: this._extensionModuleFilter },
        'Adding extension',
      )
      resolved.push(chosen)
    }

    return resolved
  }

  /** Variants the active filter may add beyond the minimal set; null when it adds none */
  private _candidatesForFilter(variants: ExtensionModuleVariants): ExtensionModuleVariants | null {
    switch (this._extensionModuleFilter) {
      case 'minimal':
        return null
      case 'all':
        return variants
      case 'no-libraries':
        return variants.filter((em) => !requiresLibraries(em))
      case 'no-gpl':
        return variants.filter(isNonCopyleftExtension)
    }
  }

  // -------------------------------------------------------------------------
  // Serialization
  // -------------------------------------------------------------------------

  /**
   * Snapshot this policy as a config document; packagingPolicyFromConfig()
   * of the result yields an equivalent policy.
   */
  toConfig(): PackagingPolicyConfig {
    return {
      extension_module_filter: this._extensionModuleFilter,
      resources_policy: formatResourcesPolicy(this._resourcesPolicy),
      include_distribution_sources: this._includeDistributionSources,
      include_distribution_resources: this._includeDistributionResources,
      include_test: this._includeTest,
      preferred_extension_module_variants: Object.fromEntries(this._preferredExtensionModuleVariants),
      broken_extensions: Object.fromEntries(
        [...this._brokenExtensions].map(([triple, names]) => [triple, [...names]]),
      ),
    }
  }
}
