/**
 * ResourcesPolicy — where packaged Python resources may be loaded from at runtime.
 *
 * Textual forms:
 *  - `in-memory-only`
 *  - `filesystem-relative-only:<prefix>`
 *  - `prefer-in-memory-fallback-filesystem-relative:<prefix>`
 *
 * The prefix is an opaque install path relative to the produced binary; it is
 * carried verbatim and never checked against the filesystem.
 */

import { InvalidPolicyValueError } from '../../core/errors.js'

// ---------------------------------------------------------------------------
// Type
// ---------------------------------------------------------------------------

export type ResourcesPolicy =
  /** Resources must load from memory; anything that cannot is an error */
  | { kind: 'in-memory-only' }
  /** Resources load from files installed under `prefix` next to the binary */
  | { kind: 'filesystem-relative-only'; prefix: string }
  /** Load from memory where possible, otherwise from files under `prefix` */
  | { kind: 'prefer-in-memory-fallback-filesystem-relative'; prefix: string }

const IN_MEMORY_ONLY = 'in-memory-only'
const FILESYSTEM_RELATIVE_ONLY_PREFIX = 'filesystem-relative-only:'
const PREFER_IN_MEMORY_PREFIX = 'prefer-in-memory-fallback-filesystem-relative:'

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function inMemoryOnly(): ResourcesPolicy {
  return { kind: 'in-memory-only' }
}

export function filesystemRelativeOnly(prefix: string): ResourcesPolicy {
  return { kind: 'filesystem-relative-only', prefix }
}

export function preferInMemoryFallbackFilesystemRelative(prefix: string): ResourcesPolicy {
  return { kind: 'prefer-in-memory-fallback-filesystem-relative', prefix }
}

// ---------------------------------------------------------------------------
// parse / format
// ---------------------------------------------------------------------------

/**
 * Parse the textual form of a resources policy.
 *
 * Only the first `:` separates the form from the prefix, so prefixes may
 * themselves contain colons.
 *
 * @throws {InvalidPolicyValueError} if `value` matches none of the three forms
 *
 * @example
 * parseResourcesPolicy('filesystem-relative-only:lib')
 * // => { kind: 'filesystem-relative-only', prefix: 'lib' }
 */
export function parseResourcesPolicy(value: string): ResourcesPolicy {
  if (value === IN_MEMORY_ONLY) {
    return inMemoryOnly()
  }
  if (value.startsWith(FILESYSTEM_RELATIVE_ONLY_PREFIX)) {
    return filesystemRelativeOnly(value.slice(FILESYSTEM_RELATIVE_ONLY_PREFIX.length))
  }
  if (value.startsWith(PREFER_IN_MEMORY_PREFIX)) {
    return preferInMemoryFallbackFilesystemRelative(value.slice(PREFER_IN_MEMORY_PREFIX.length))
  }
  throw new InvalidPolicyValueError(value)
}

/** Render a resources policy in the form `parseResourcesPolicy` accepts */
export function formatResourcesPolicy(policy: ResourcesPolicy): string {
  switch (policy.kind) {
    case 'in-memory-only':
      return IN_MEMORY_ONLY
    case 'filesystem-relative-only':
      return `${FILESYSTEM_RELATIVE_ONLY_PREFIX}${policy.prefix}`
    case 'prefer-in-memory-fallback-filesystem-relative':
      return `${PREFER_IN_MEMORY_PREFIX}${policy.prefix}`
  }
}

export function resourcesPoliciesEqual(a: ResourcesPolicy, b: ResourcesPolicy): boolean {
  return formatResourcesPolicy(a) === formatResourcesPolicy(b)
}
