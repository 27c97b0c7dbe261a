/**
 * Resources module — barrel export.
 */

export type {
  PythonResource,
  PythonResourceKind,
  PythonModuleSource,
  PythonModuleBytecodeRequest,
  PythonModuleBytecode,
  PythonPackageResource,
  PythonPackageDistributionResource,
  PythonPathExtension,
  PythonEggFile,
  ExtensionModule,
  LibraryDependency,
} from './types.js'
export { describeResource, isMinimallyRequired, requiresLibraries } from './types.js'

export { ExtensionModuleVariants } from './extension-module-variants.js'
