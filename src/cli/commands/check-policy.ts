/**
 * `pypack-policy check-policy` command
 *
 * Loads and validates a packaging policy file and prints the normalized
 * policy (every default filled in).
 *
 * Usage:
 *   pypack-policy check-policy policy.yaml                        YAML output
 *   pypack-policy check-policy policy.yaml --output-format json   JSON output
 *
 * Exit codes:
 *   0  — policy is valid
 *   1  — unexpected system error
 *   2  — unreadable file, syntax error, schema error or invalid strategy value
 */

import type { Command } from 'commander'
import { dump as yamlDump } from 'js-yaml'
import { PackagingError } from '../../core/errors.js'
import {
  loadPackagingPolicy,
  type PackagingPolicyConfig,
} from '../../modules/packaging-policy/policy-config.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('cli:check-policy')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CHECK_POLICY_EXIT_SUCCESS = 0
export const CHECK_POLICY_EXIT_ERROR = 1
export const CHECK_POLICY_EXIT_USAGE_ERROR = 2

export interface CheckPolicyActionOptions {
  filePath: string
  outputFormat: 'human' | 'json'
}

/**
 * Core action for the check-policy command.
 *
 * Returns an exit code. Separated from Commander integration for testability.
 */
export function runCheckPolicyAction(options: CheckPolicyActionOptions): number {
  const { filePath, outputFormat } = options

  let config: PackagingPolicyConfig
  try {
    config = loadPackagingPolicy(filePath).toConfig()
  } catch (err) {
    if (err instanceof PackagingError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return CHECK_POLICY_EXIT_USAGE_ERROR
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ filePath, err: message }, 'check-policy failed')
    process.stderr.write(`Error: ${message}\n`)
    return CHECK_POLICY_EXIT_ERROR
  }

  if (outputFormat === 'json') {
    process.stdout.write(JSON.stringify(config, null, 2) + '\n')
  } else {
    process.stdout.write(yamlDump(config))
  }
  return CHECK_POLICY_EXIT_SUCCESS
}

/**
 * Register the `check-policy` command with the CLI program.
 */
export function registerCheckPolicyCommand(program: Command): void {
  program
    .command('check-policy <file>')
    .description('Validate a packaging policy file and print the normalized policy')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action((file: string, opts: { outputFormat: string }) => {
      const outputFormat = opts.outputFormat === 'json' ? 'json' : 'human'
      process.exitCode = runCheckPolicyAction({ filePath: file, outputFormat })
    })
}
