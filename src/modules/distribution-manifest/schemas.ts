/**
 * Zod schemas for distribution manifest YAML/JSON files.
 *
 * A manifest lists what a Python distribution offers for packaging: the
 * resources found in it and the available variants of each extension module.
 * Keys are snake_case; the loader converts entries into the camelCase
 * resource types.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Shared pieces
// ---------------------------------------------------------------------------

export const OptimizeLevelSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]).default(0)

export const LibraryDependencySchema = z.object({
  name: z.string().min(1, 'Library name is required'),
  static: z.boolean().default(false),
  dynamic: z.boolean().default(false),
  framework: z.boolean().default(false),
  system: z.boolean().default(false),
})

export type LibraryDependencyEntry = z.infer<typeof LibraryDependencySchema>

/** Fields of one extension module variant, without its name */
export const ExtensionVariantSchema = z.object({
  variant: z.string().optional(),
  init_fn_name: z.string().optional(),
  required: z.boolean().default(false),
  builtin_default: z.boolean().default(false),
  is_stdlib: z.boolean().default(false),
  is_package: z.boolean().default(false),
  link_libraries: z.array(LibraryDependencySchema).default([]),
  licenses: z.array(z.string()).optional(),
  license_public_domain: z.boolean().optional(),
})

export type ExtensionVariantEntry = z.infer<typeof ExtensionVariantSchema>

export const ExtensionModuleEntrySchema = ExtensionVariantSchema.extend({
  name: z.string().min(1, 'Extension module name is required'),
})

export type ExtensionModuleEntry = z.infer<typeof ExtensionModuleEntrySchema>

// ---------------------------------------------------------------------------
// Resources
// ---------------------------------------------------------------------------

const ModuleFields = {
  name: z.string().min(1, 'Module name is required'),
  is_package: z.boolean().default(false),
  is_stdlib: z.boolean().default(false),
  is_test: z.boolean().default(false),
}

export const ResourceEntrySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('module-source'), ...ModuleFields }),
  z.object({
    kind: z.literal('module-bytecode-request'),
    ...ModuleFields,
    optimize_level: OptimizeLevelSchema,
  }),
  z.object({
    kind: z.literal('module-bytecode'),
    ...ModuleFields,
    optimize_level: OptimizeLevelSchema,
  }),
  z.object({
    kind: z.literal('resource'),
    leaf_package: z.string().min(1),
    relative_name: z.string().min(1),
    is_stdlib: z.boolean().default(false),
    is_test: z.boolean().default(false),
  }),
  z.object({
    kind: z.literal('distribution-resource'),
    package: z.string().min(1),
    version: z.string().min(1),
    name: z.string().min(1),
  }),
  z.object({ kind: z.literal('extension-module-dynamic-library'), extension: ExtensionModuleEntrySchema }),
  z.object({ kind: z.literal('extension-module-statically-linked'), extension: ExtensionModuleEntrySchema }),
  z.object({ kind: z.literal('path-extension'), name: z.string().min(1) }),
  z.object({ kind: z.literal('egg-file'), path: z.string().min(1) }),
])

export type ResourceEntry = z.infer<typeof ResourceEntrySchema>

// ---------------------------------------------------------------------------
// DistributionManifestSchema
// ---------------------------------------------------------------------------

export const ExtensionModuleGroupSchema = z.object({
  name: z.string().min(1, 'Extension module name is required'),
  variants: z.array(ExtensionVariantSchema).min(1, 'At least one variant is required'),
})

export const DistributionManifestSchema = z.object({
  /** Target the distribution was built for; used when no target is given explicitly */
  target_triple: z.string().min(1).optional(),
  resources: z.array(ResourceEntrySchema).default([]),
  extension_modules: z.array(ExtensionModuleGroupSchema).default([]),
})

export type DistributionManifestFile = z.infer<typeof DistributionManifestSchema>
