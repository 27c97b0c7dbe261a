export { NON_COPYLEFT_LICENSES, isNonCopyleftLicense } from './licensing.js'
