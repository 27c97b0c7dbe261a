/**
 * ExtensionModuleFilter — how aggressively extension modules are packaged.
 *
 *  - `minimal`: only variants the interpreter cannot start without
 *  - `all`: every extension module
 *  - `no-libraries`: every extension that links no external library
 *  - `no-gpl`: every extension whose linked libraries carry no copyleft license
 */

import { InvalidFilterValueError } from '../../core/errors.js'

export const EXTENSION_MODULE_FILTERS = ['minimal', 'all', 'no-libraries', 'no-gpl'] as const

export type ExtensionModuleFilter = (typeof EXTENSION_MODULE_FILTERS)[number]

function isExtensionModuleFilter(value: string): value is ExtensionModuleFilter {
  return (EXTENSION_MODULE_FILTERS as readonly string[]).includes(value)
}

/**
 * @throws {InvalidFilterValueError} if `value` is not one of the four literals
 */
export function parseExtensionModuleFilter(value: string): ExtensionModuleFilter {
  if (!isExtensionModuleFilter(value)) {
    throw new InvalidFilterValueError(value)
  }
  return value
}

export function formatExtensionModuleFilter(filter: ExtensionModuleFilter): string {
  return filter
}
