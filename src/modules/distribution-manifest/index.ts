export type { DistributionManifest, ManifestFormat } from './manifest-loader.js'
export {
  parseDistributionManifest,
  loadDistributionManifest,
  toPythonResource,
  toExtensionModule,
} from './manifest-loader.js'

export type { DistributionManifestFile, ResourceEntry, ExtensionVariantEntry } from './schemas.js'
export { DistributionManifestSchema, ResourceEntrySchema } from './schemas.js'
