/**
 * `pypack-policy resolve` command
 *
 * Applies a packaging policy to a distribution manifest: every resource goes
 * through the inclusion filter and the extension module groups are resolved
 * for the target triple.
 *
 * Usage:
 *   pypack-policy resolve dist.yaml --policy policy.yaml --target x86_64-unknown-linux-gnu
 *   pypack-policy resolve dist.yaml --output-format json
 *
 * Without --policy the default policy is used. Without --target the
 * manifest's target_triple is used.
 *
 * Exit codes:
 *   0  — success
 *   1  — unexpected system error
 *   2  — missing target, invalid policy or invalid manifest
 */

import type { Command } from 'commander'
import { PackagingError } from '../../core/errors.js'
import {
  loadDistributionManifest,
  type DistributionManifest,
} from '../../modules/distribution-manifest/manifest-loader.js'
import { PackagingPolicy } from '../../modules/packaging-policy/packaging-policy.js'
import { loadPackagingPolicy } from '../../modules/packaging-policy/policy-config.js'
import { formatResourcesPolicy } from '../../modules/packaging-policy/resources-policy.js'
import { describeResource, type ExtensionModule, type PythonResource } from '../../modules/resources/types.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('cli:resolve')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const RESOLVE_EXIT_SUCCESS = 0
export const RESOLVE_EXIT_ERROR = 1
export const RESOLVE_EXIT_USAGE_ERROR = 2

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ResolveActionOptions {
  manifestPath: string
  policyPath?: string
  targetTriple?: string
  outputFormat: 'human' | 'json'
}

export interface ResolutionReport {
  targetTriple: string
  extensionModuleFilter: string
  resourcesPolicy: string
  includedResources: PythonResource[]
  excludedResources: PythonResource[]
  extensionModules: ExtensionModule[]
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Apply `policy` to everything in `manifest` for `targetTriple`.
 */
export function buildResolutionReport(
  policy: PackagingPolicy,
  manifest: DistributionManifest,
  targetTriple: string,
): ResolutionReport {
  const includedResources: PythonResource[] = []
  const excludedResources: PythonResource[] = []
  for (const resource of manifest.resources) {
    if (policy.filterPythonResource(resource)) {
      includedResources.push(resource)
    } else {
      excludedResources.push(resource)
    }
  }

  return {
    targetTriple,
    extensionModuleFilter: policy.getExtensionModuleFilter(),
    resourcesPolicy: formatResourcesPolicy(policy.getResourcesPolicy()),
    includedResources,
    excludedResources,
    extensionModules: policy.resolvePythonExtensionModules(manifest.extensionModules, targetTriple),
  }
}

// ---------------------------------------------------------------------------
// Renderers
// ---------------------------------------------------------------------------

function describeExtension(extension: ExtensionModule): string {
  return extension.variant !== undefined ? `${extension.name} (variant: ${extension.variant})` : extension.name
}

/**
 * Render a report as human-readable text.
 */
export function renderHuman(report: ResolutionReport): string {
  const lines: string[] = [
    `Target: ${report.targetTriple}`,
    `Extension module filter: ${report.extensionModuleFilter}`,
    `Resources policy: ${report.resourcesPolicy}`,
    '',
    `Included resources (${report.includedResources.length}):`,
    ...report.includedResources.map((r) => `  ${r.kind} ${describeResource(r)}`),
    `Excluded resources (${report.excludedResources.length}):`,
    ...report.excludedResources.map((r) => `  ${r.kind} ${describeResource(r)}`),
    `Extension modules (${report.extensionModules.length}):`,
    ...report.extensionModules.map((em) => `  ${describeExtension(em)}`),
  ]
  return lines.join('\n')
}

/**
 * Render a report as JSON.
 */
export function renderJson(report: ResolutionReport): string {
  const resourceJson = (r: PythonResource) => ({ kind: r.kind, name: describeResource(r) })
  return JSON.stringify(
    {
      target_triple: report.targetTriple,
      extension_module_filter: report.extensionModuleFilter,
      resources_policy: report.resourcesPolicy,
      resources: {
        included: report.includedResources.map(resourceJson),
        excluded: report.excludedResources.map(resourceJson),
      },
      extension_modules: report.extensionModules.map((em) => ({
        name: em.name,
        variant: em.variant ?? null,
      })),
    },
    null,
    2,
  )
}

// ---------------------------------------------------------------------------
// runResolveAction — testable core logic
// ---------------------------------------------------------------------------

/**
 * Core action for the resolve command.
 *
 * Returns an exit code. Separated from Commander integration for testability.
 */
export function runResolveAction(options: ResolveActionOptions): number {
  const { manifestPath, policyPath, outputFormat } = options

  let report: ResolutionReport
  try {
    const manifest = loadDistributionManifest(manifestPath)
    const policy = policyPath !== undefined ? loadPackagingPolicy(policyPath) : new PackagingPolicy()

    const targetTriple = options.targetTriple ?? manifest.targetTriple
    if (targetTriple === undefined) {
      process.stderr.write(
        'Error: No target triple given; pass --target or set target_triple in the manifest\n',
      )
      return RESOLVE_EXIT_USAGE_ERROR
    }

    report = buildResolutionReport(policy, manifest, targetTriple)
  } catch (err) {
    if (err instanceof PackagingError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return RESOLVE_EXIT_USAGE_ERROR
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ manifestPath, policyPath, err: message }, 'resolve failed')
    process.stderr.write(`Error: ${message}\n`)
    return RESOLVE_EXIT_ERROR
  }

  logger.debug(
    {
      targetTriple: report.targetTriple,
      included: report.includedResources.length,
      extensions: report.extensionModules.length,
    },
    'Resolution complete',
  )

  process.stdout.write((outputFormat === 'json' ? renderJson(report) : renderHuman(report)) + '\n')
  return RESOLVE_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// registerResolveCommand
// ---------------------------------------------------------------------------

/**
 * Register the `resolve` command with the CLI program.
 */
export function registerResolveCommand(program: Command): void {
  program
    .command('resolve <manifest>')
    .description('Apply a packaging policy to a distribution manifest')
    .option('--policy <file>', 'Packaging policy file (YAML or JSON); defaults apply when omitted')
    .option('--target <triple>', 'Target triple; defaults to the manifest target_triple')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action((manifest: string, opts: { policy?: string; target?: string; outputFormat: string }) => {
      const outputFormat = opts.outputFormat === 'json' ? 'json' : 'human'
      process.exitCode = runResolveAction({
        manifestPath: manifest,
        policyPath: opts.policy,
        targetTriple: opts.target,
        outputFormat,
      })
    })
}
