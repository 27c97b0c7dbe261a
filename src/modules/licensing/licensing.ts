/**
 * Non-copyleft license allow-list.
 *
 * SPDX identifiers of licenses that carry no GPL-family obligations. The
 * `no-gpl` extension module filter admits a variant's linked libraries only
 * when every license they declare appears here. Identifiers not on the list
 * (including ones unknown today) are treated as copyleft.
 */

import { z } from 'zod'
import licenseIds from './non-copyleft-licenses.json' with { type: 'json' }

const LicenseListSchema = z.array(z.string().min(1))

/** Every license identifier the `no-gpl` filter admits */
export const NON_COPYLEFT_LICENSES: ReadonlySet<string> = new Set(LicenseListSchema.parse(licenseIds))

/** Whether `license` is on the non-copyleft allow-list (exact, case-sensitive match) */
export function isNonCopyleftLicense(license: string): boolean {
  return NON_COPYLEFT_LICENSES.has(license)
}
