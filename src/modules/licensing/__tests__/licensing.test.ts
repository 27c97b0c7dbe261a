import { describe, it, expect } from 'vitest'
import { NON_COPYLEFT_LICENSES, isNonCopyleftLicense } from '../licensing.js'

describe('non-copyleft license allow-list', () => {
  it.each(['MIT', 'BSD-3-Clause', 'Apache-2.0', 'Zlib', 'OpenSSL', 'blessing', 'Python-2.0'])(
    'admits %s',
    (license) => {
      expect(isNonCopyleftLicense(license)).toBe(true)
    },
  )

  it.each(['GPL-2.0', 'GPL-3.0', 'GPL-3.0-or-later', 'LGPL-2.1', 'AGPL-3.0', 'mit', 'Proprietary'])(
    'does not admit %s',
    (license) => {
      expect(isNonCopyleftLicense(license)).toBe(false)
    },
  )

  it('contains no GPL-family identifier', () => {
    const gplFamily = [...NON_COPYLEFT_LICENSES].filter((id) => /^(A|L)?GPL-/.test(id))
    expect(gplFamily).toEqual([])
  })
})
