#!/usr/bin/env node
/**
 * pypack-policy CLI - Main entry point
 * Provides the `pypack-policy` command-line interface
 */

import { Command } from 'commander'
import { existsSync, readFileSync, realpathSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { createLogger } from '../utils/logger.js'
import { registerCheckPolicyCommand } from './commands/check-policy.js'
import { registerResolveCommand } from './commands/resolve.js'

const logger = createLogger('cli')

/** Resolve the package version relative to this file */
export function getPackageVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url))
  // Run from src/cli or dist/cli
  const candidates = [resolve(__dirname, '../../package.json'), resolve(__dirname, '../package.json')]

  for (const pkgPath of candidates) {
    if (!existsSync(pkgPath)) continue
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string }
    if (pkg.version !== undefined) {
      return pkg.version
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('pypack-policy')
    .description('Decide which Python distribution resources and extension modules get embedded')
    .version(getPackageVersion(), '-v, --version', 'Output the current version')

  registerCheckPolicyCommand(program)
  registerResolveCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Only run when executed directly, not when imported by tests
const entry = process.argv[1]
if (entry !== undefined && existsSync(entry) && realpathSync(entry) === fileURLToPath(import.meta.url)) {
  void main()
}
