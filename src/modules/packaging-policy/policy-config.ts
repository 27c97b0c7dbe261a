/**
 * PackagingPolicyConfig — Zod schema and loader for packaging policy files.
 *
 * A policy file (YAML or JSON) controls:
 *  - which extension modules are packaged (extension_module_filter)
 *  - where resources load from at runtime (resources_policy)
 *  - whether distribution sources, package resources and tests are included
 *  - preferred extension module variants
 *  - extensions known to be broken per target triple
 *
 * @example
 * extension_module_filter: no-gpl
 * resources_policy: "prefer-in-memory-fallback-filesystem-relative:lib"
 * include_test: false
 * preferred_extension_module_variants:
 *   _sqlite3: static
 * broken_extensions:
 *   x86_64-unknown-linux-musl: [_crypt, nis]
 */

import { readFileSync } from 'node:fs'
import { extname } from 'node:path'
import { load as yamlLoad } from 'js-yaml'
import { z } from 'zod'
import { PolicyConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { parseExtensionModuleFilter } from './extension-module-filter.js'
import { PackagingPolicy } from './packaging-policy.js'
import { parseResourcesPolicy } from './resources-policy.js'

const logger = createLogger('policy-config')

// ---------------------------------------------------------------------------
// Zod Schema
// ---------------------------------------------------------------------------

/**
 * Complete packaging policy document schema.
 *
 * Strategy values stay strings here; they are parsed by their own parsers so
 * that a bad value surfaces as InvalidFilterValueError / InvalidPolicyValueError.
 */
export const PackagingPolicyConfigSchema = z
  .object({
    extension_module_filter: z.string().default('all'),
    resources_policy: z.string().default('in-memory-only'),
    include_distribution_sources: z.boolean().default(true),
    include_distribution_resources: z.boolean().default(false),
    include_test: z.boolean().default(false),
    preferred_extension_module_variants: z.record(z.string(), z.string()).default({}),
    broken_extensions: z.record(z.string(), z.array(z.string())).default({}),
  })
  .strict()

export type PackagingPolicyConfig = z.infer<typeof PackagingPolicyConfigSchema>

export type PolicyConfigFormat = 'yaml' | 'json'

// ---------------------------------------------------------------------------
// Building a policy
// ---------------------------------------------------------------------------

/**
 * Build a PackagingPolicy from a validated config document.
 *
 * @throws {InvalidFilterValueError} if extension_module_filter is not a known filter
 * @throws {InvalidPolicyValueError} if resources_policy is not a known form
 */
export function packagingPolicyFromConfig(config: PackagingPolicyConfig): PackagingPolicy {
  const policy = new PackagingPolicy()

  policy.setExtensionModuleFilter(parseExtensionModuleFilter(config.extension_module_filter))
  policy.setResourcesPolicy(parseResourcesPolicy(config.resources_policy))
  policy.setIncludeDistributionSources(config.include_distribution_sources)
  policy.setIncludeDistributionResources(config.include_distribution_resources)
  policy.setIncludeTest(config.include_test)

  for (const [extension, variant] of Object.entries(config.preferred_extension_module_variants)) {
    policy.setPreferredExtensionModuleVariant(extension, variant)
  }

  for (const [targetTriple, extensions] of Object.entries(config.broken_extensions)) {
    for (const extension of extensions) {
      policy.registerBrokenExtension(targetTriple, extension)
    }
  }

  return policy
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((e) => `  - ${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
    .join('\n')
}

/**
 * Parse and validate a packaging policy document from a string.
 *
 * @param content - YAML or JSON text
 * @param format - Syntax of `content`
 * @param source - Label used in error messages (usually the file path)
 * @throws {PolicyConfigError} on syntax or schema errors
 */
export function parsePackagingPolicyConfig(
  content: string,
  format: PolicyConfigFormat = 'yaml',
  source = '<string>',
): PackagingPolicy {
  let rawObject: unknown
  try {
    rawObject = format === 'json' ? (JSON.parse(content) as unknown) : yamlLoad(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new PolicyConfigError(
      `Invalid ${format === 'json' ? 'JSON' : 'YAML'} in packaging policy "${source}": ${message}`,
      undefined,
      { source },
    )
  }

  // An empty document means "all defaults"
  if (rawObject === undefined || rawObject === null) {
    rawObject = {}
  }

  if (typeof rawObject !== 'object' || Array.isArray(rawObject)) {
    throw new PolicyConfigError(`Packaging policy "${source}" must contain an object`, undefined, {
      source,
    })
  }

  const result = PackagingPolicyConfigSchema.safeParse(rawObject)
  if (!result.success) {
    const details = formatIssues(result.error)
    throw new PolicyConfigError(
      `Packaging policy validation failed for "${source}":\n${details}`,
      details,
      { source },
    )
  }

  return packagingPolicyFromConfig(result.data)
}

// ---------------------------------------------------------------------------
// loadPackagingPolicy
// ---------------------------------------------------------------------------

/**
 * Load and validate a packaging policy file. `.json` files are read as JSON,
 * anything else as YAML.
 *
 * @param filePath - Absolute or relative path to the policy file
 * @throws {PolicyConfigError} if the file cannot be read, parsed or validated
 *
 * @example
 * const policy = loadPackagingPolicy('packaging-policy.yaml')
 */
export function loadPackagingPolicy(filePath: string): PackagingPolicy {
  let rawContent: string
  try {
    rawContent = readFileSync(filePath, 'utf-8')
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new PolicyConfigError(
      `Cannot read packaging policy file at "${filePath}": ${message}`,
      undefined,
      { filePath },
    )
  }

  const format: PolicyConfigFormat = extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml'
  const policy = parsePackagingPolicyConfig(rawContent, format, filePath)
  logger.debug({ filePath, filter: policy.getExtensionModuleFilter() }, 'Packaging policy loaded')
  return policy
}
