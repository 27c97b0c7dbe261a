/**
 * Resource types — the items a Python distribution offers for packaging.
 *
 * Discovery of these values happens outside this package (see the
 * distribution-manifest module for a file-based stand-in). The packaging
 * policy only reads them.
 */

// ---------------------------------------------------------------------------
// Module resources
// ---------------------------------------------------------------------------

/** A Python module's source code */
export interface PythonModuleSource {
  /** Fully qualified module name (e.g. `json.decoder`) */
  name: string
  isPackage: boolean
  isStdlib: boolean
  /** Whether the module only exists to test other code */
  isTest: boolean
}

/** A request to compile a module's source into bytecode at packaging time */
export interface PythonModuleBytecodeRequest {
  name: string
  /** Optimization level passed to the bytecode compiler (0, 1 or 2) */
  optimizeLevel: 0 | 1 | 2
  isPackage: boolean
  isStdlib: boolean
  isTest: boolean
}

/** Pre-compiled module bytecode */
export interface PythonModuleBytecode {
  name: string
  optimizeLevel: 0 | 1 | 2
  isPackage: boolean
  isStdlib: boolean
  isTest: boolean
}

/** A non-code file that lives inside a Python package */
export interface PythonPackageResource {
  /** The leaf-most package containing the file */
  leafPackage: string
  /** Path of the file relative to `leafPackage` */
  relativeName: string
  isStdlib: boolean
  isTest: boolean
}

/** A file from a package's distribution metadata (`.dist-info` / `.egg-info`) */
export interface PythonPackageDistributionResource {
  package: string
  version: string
  name: string
}

/** A `.pth` file extending `sys.path` */
export interface PythonPathExtension {
  name: string
}

/** A `.egg` archive or directory */
export interface PythonEggFile {
  path: string
}

// ---------------------------------------------------------------------------
// Extension modules
// ---------------------------------------------------------------------------

/** A library an extension module links against */
export interface LibraryDependency {
  name: string
  /** Linked statically into the extension */
  static: boolean
  /** Linked dynamically; must be present at runtime */
  dynamic: boolean
  /** Apple framework */
  framework: boolean
  /** Provided by the operating system */
  system: boolean
}

/**
 * One concrete variant of a compiled extension module.
 *
 * Several variants can share a `name` (for example one linked against the
 * system `libsqlite3` and one with it compiled in); `variant` tells them apart.
 */
export interface ExtensionModule {
  /** Importable module name (e.g. `_ssl`) */
  name: string
  /** Variant identifier; absent for extensions offered in one form only */
  variant?: string
  /** Name of the module's init function (defaults to `PyInit_<name>`) */
  initFnName?: string
  /** Whether the interpreter cannot start without this extension */
  required: boolean
  /** Whether the distribution compiles this extension into libpython by default */
  builtinDefault: boolean
  isStdlib: boolean
  isPackage: boolean
  linkLibraries: LibraryDependency[]
  /** SPDX identifiers of the licenses of linked libraries, when known */
  licenses?: string[]
  /** Explicit public-domain marker for linked libraries */
  licensePublicDomain?: boolean
}

// ---------------------------------------------------------------------------
// PythonResource union
// ---------------------------------------------------------------------------

export type PythonResource =
  | { kind: 'module-source'; module: PythonModuleSource }
  | { kind: 'module-bytecode-request'; module: PythonModuleBytecodeRequest }
  | { kind: 'module-bytecode'; module: PythonModuleBytecode }
  | { kind: 'resource'; resource: PythonPackageResource }
  | { kind: 'distribution-resource'; resource: PythonPackageDistributionResource }
  | { kind: 'extension-module-dynamic-library'; extension: ExtensionModule }
  | { kind: 'extension-module-statically-linked'; extension: ExtensionModule }
  | { kind: 'path-extension'; extension: PythonPathExtension }
  | { kind: 'egg-file'; egg: PythonEggFile }

export type PythonResourceKind = PythonResource['kind']

/**
 * Human-readable identifier for a resource, used in logs and CLI output.
 */
export function describeResource(resource: PythonResource): string {
  switch (resource.kind) {
    case 'module-source':
    case 'module-bytecode-request':
    case 'module-bytecode':
      return resource.module.name
    case 'resource':
      return `${resource.resource.leafPackage}/${resource.resource.relativeName}`
    case 'distribution-resource':
      return `${resource.resource.package}-${resource.resource.version}/${resource.resource.name}`
    case 'extension-module-dynamic-library':
    case 'extension-module-statically-linked':
      return resource.extension.name
    case 'path-extension':
      return resource.extension.name
    case 'egg-file':
      return resource.egg.path
  }
}

/** Whether a module variant is needed for a working interpreter */
export function isMinimallyRequired(extension: ExtensionModule): boolean {
  return extension.required
}

/** Whether a module variant links against any library */
export function requiresLibraries(extension: ExtensionModule): boolean {
  return extension.linkLibraries.length > 0
}
