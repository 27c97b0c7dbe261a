/**
 * Tests for ResourcesPolicy parse/format and ExtensionModuleFilter parsing.
 */

import { describe, it, expect } from 'vitest'
import { InvalidFilterValueError, InvalidPolicyValueError } from '../../../core/errors.js'
import {
  filesystemRelativeOnly,
  formatResourcesPolicy,
  inMemoryOnly,
  parseResourcesPolicy,
  preferInMemoryFallbackFilesystemRelative,
  resourcesPoliciesEqual,
  type ResourcesPolicy,
} from '../resources-policy.js'
import {
  EXTENSION_MODULE_FILTERS,
  formatExtensionModuleFilter,
  parseExtensionModuleFilter,
} from '../extension-module-filter.js'

describe('parseResourcesPolicy', () => {
  it('parses in-memory-only', () => {
    expect(parseResourcesPolicy('in-memory-only')).toEqual({ kind: 'in-memory-only' })
  })

  it('parses filesystem-relative-only with its prefix', () => {
    expect(parseResourcesPolicy('filesystem-relative-only:lib')).toEqual({
      kind: 'filesystem-relative-only',
      prefix: 'lib',
    })
  })

  it('parses the hybrid policy with its prefix', () => {
    expect(parseResourcesPolicy('prefer-in-memory-fallback-filesystem-relative:lib/python')).toEqual({
      kind: 'prefer-in-memory-fallback-filesystem-relative',
      prefix: 'lib/python',
    })
  })

  it('keeps colons after the first one in the prefix', () => {
    expect(parseResourcesPolicy('filesystem-relative-only:C:\\stuff:x')).toEqual({
      kind: 'filesystem-relative-only',
      prefix: 'C:\\stuff:x',
    })
  })

  it('accepts an empty prefix', () => {
    expect(parseResourcesPolicy('filesystem-relative-only:')).toEqual(filesystemRelativeOnly(''))
  })

  it.each(['bogus', '', 'in-memory-only:', 'IN-MEMORY-ONLY', 'filesystem-relative-only'])(
    'rejects %j with InvalidPolicyValueError',
    (value) => {
      let caught: unknown
      try {
        parseResourcesPolicy(value)
      } catch (err) {
        caught = err
      }
      expect(caught).toBeInstanceOf(InvalidPolicyValueError)
      expect(caught).toMatchObject({ value })
    },
  )
})

describe('formatResourcesPolicy', () => {
  it('formats each variant', () => {
    expect(formatResourcesPolicy(inMemoryOnly())).toBe('in-memory-only')
    expect(formatResourcesPolicy(filesystemRelativeOnly('lib'))).toBe('filesystem-relative-only:lib')
    expect(formatResourcesPolicy(preferInMemoryFallbackFilesystemRelative('lib'))).toBe(
      'prefer-in-memory-fallback-filesystem-relative:lib',
    )
  })

  const policies: ResourcesPolicy[] = [
    inMemoryOnly(),
    filesystemRelativeOnly(''),
    filesystemRelativeOnly('a:b:c'),
    preferInMemoryFallbackFilesystemRelative(''),
    preferInMemoryFallbackFilesystemRelative('prefix with spaces/and:colons'),
  ]

  it.each(policies)('round-trips %j', (policy) => {
    expect(parseResourcesPolicy(formatResourcesPolicy(policy))).toEqual(policy)
  })

  it('compares policies by value', () => {
    expect(resourcesPoliciesEqual(filesystemRelativeOnly('x'), filesystemRelativeOnly('x'))).toBe(true)
    expect(resourcesPoliciesEqual(filesystemRelativeOnly('x'), preferInMemoryFallbackFilesystemRelative('x'))).toBe(false)
  })
})

describe('parseExtensionModuleFilter', () => {
  it.each(EXTENSION_MODULE_FILTERS)('accepts %s', (literal) => {
    expect(parseExtensionModuleFilter(literal)).toBe(literal)
    expect(formatExtensionModuleFilter(parseExtensionModuleFilter(literal))).toBe(literal)
  })

  it('rejects unknown values with InvalidFilterValueError', () => {
    expect(() => parseExtensionModuleFilter('bogus')).toThrow(InvalidFilterValueError)
    expect(() => parseExtensionModuleFilter('All')).toThrow('All is not a valid extension module filter')
  })
})
