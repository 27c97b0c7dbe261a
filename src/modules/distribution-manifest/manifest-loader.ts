/**
 * Distribution manifest loader.
 *
 * Reads a YAML or JSON manifest, validates it and converts it into the
 * resource and extension-variant values the packaging policy consumes.
 * Format is determined by file extension (.json vs anything else → YAML).
 */

import { readFileSync } from 'node:fs'
import { extname } from 'node:path'
import { load as yamlLoad } from 'js-yaml'
import type { ZodError } from 'zod'
import { ManifestError } from '../../core/errors.js'
import { ExtensionModuleVariants } from '../resources/extension-module-variants.js'
import type { ExtensionModule, PythonResource } from '../resources/types.js'
import {
  DistributionManifestSchema,
  type ExtensionVariantEntry,
  type ResourceEntry,
} from './schemas.js'

export type ManifestFormat = 'yaml' | 'json'

/** A validated manifest in domain terms */
export interface DistributionManifest {
  targetTriple?: string
  resources: PythonResource[]
  extensionModules: ExtensionModuleVariants[]
}

// ---------------------------------------------------------------------------
// Entry conversion
// ---------------------------------------------------------------------------

export function toExtensionModule(name: string, entry: ExtensionVariantEntry): ExtensionModule {
  return {
    name,
    variant: entry.variant,
    initFnName: entry.init_fn_name,
    required: entry.required,
    builtinDefault: entry.builtin_default,
    isStdlib: entry.is_stdlib,
    isPackage: entry.is_package,
    linkLibraries: entry.link_libraries.map((lib) => ({ ...lib })),
    licenses: entry.licenses,
    licensePublicDomain: entry.license_public_domain,
  }
}

export function toPythonResource(entry: ResourceEntry): PythonResource {
  switch (entry.kind) {
    case 'module-source':
      return {
        kind: entry.kind,
        module: {
          name: entry.name,
          isPackage: entry.is_package,
          isStdlib: entry.is_stdlib,
          isTest: entry.is_test,
        },
      }
    case 'module-bytecode-request':
    case 'module-bytecode':
      return {
        kind: entry.kind,
        module: {
          name: entry.name,
          optimizeLevel: entry.optimize_level,
          isPackage: entry.is_package,
          isStdlib: entry.is_stdlib,
          isTest: entry.is_test,
        },
      }
    case 'resource':
      return {
        kind: entry.kind,
        resource: {
          leafPackage: entry.leaf_package,
          relativeName: entry.relative_name,
          isStdlib: entry.is_stdlib,
          isTest: entry.is_test,
        },
      }
    case 'distribution-resource':
      return {
        kind: entry.kind,
        resource: { package: entry.package, version: entry.version, name: entry.name },
      }
    case 'extension-module-dynamic-library':
    case 'extension-module-statically-linked':
      return {
        kind: entry.kind,
        extension: toExtensionModule(entry.extension.name, entry.extension),
      }
    case 'path-extension':
      return { kind: entry.kind, extension: { name: entry.name } }
    case 'egg-file':
      return { kind: entry.kind, egg: { path: entry.path } }
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function formatIssues(error: ZodError): string {
  return error.issues
    .map((e) => `  - ${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
    .join('\n')
}

/**
 * Parse and validate a distribution manifest from a string.
 *
 * @throws {ManifestError} on syntax or schema errors
 */
export function parseDistributionManifest(
  content: string,
  format: ManifestFormat = 'yaml',
  source = '<string>',
): DistributionManifest {
  let raw: unknown
  try {
    raw = format === 'json' ? (JSON.parse(content) as unknown) : yamlLoad(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ManifestError(
      `Invalid ${format === 'json' ? 'JSON' : 'YAML'} in distribution manifest "${source}": ${message}`,
      undefined,
      { source },
    )
  }

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ManifestError(`Distribution manifest "${source}" must contain an object`, undefined, {
      source,
    })
  }

  const result = DistributionManifestSchema.safeParse(raw)
  if (!result.success) {
    const details = formatIssues(result.error)
    throw new ManifestError(
      `Distribution manifest validation failed for "${source}":\n${details}`,
      details,
      { source },
    )
  }

  const manifest = result.data
  return {
    targetTriple: manifest.target_triple,
    resources: manifest.resources.map(toPythonResource),
    extensionModules: manifest.extension_modules.map(
      (group) =>
        new ExtensionModuleVariants(group.variants.map((entry) => toExtensionModule(group.name, entry))),
    ),
  }
}

/**
 * Read and parse a distribution manifest file.
 *
 * @throws {ManifestError} if the file cannot be read, parsed or validated
 */
export function loadDistributionManifest(filePath: string): DistributionManifest {
  let content: string
  try {
    content = readFileSync(filePath, 'utf-8')
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ManifestError(`Failed to read distribution manifest "${filePath}": ${message}`, undefined, {
      filePath,
    })
  }

  const format: ManifestFormat = extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml'
  return parseDistributionManifest(content, format, filePath)
}
