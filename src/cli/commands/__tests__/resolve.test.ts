/**
 * Unit tests for `src/cli/commands/resolve.ts`
 *
 * Covers:
 *   - Policy + manifest → human report with included/excluded resources and extensions
 *   - Default policy, explicit --target, JSON output
 *   - Missing target triple → exit 2
 *   - Invalid policy / missing manifest → exit 2
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { dirname, join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { runResolveAction, RESOLVE_EXIT_SUCCESS, RESOLVE_EXIT_USAGE_ERROR } from '../resolve.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const MANIFEST_FIXTURES = resolve(__dirname, '../../../modules/distribution-manifest/__tests__/fixtures')
const MANIFEST = resolve(MANIFEST_FIXTURES, 'distribution.yaml')
const NO_GPL_POLICY = resolve(MANIFEST_FIXTURES, 'policy-no-gpl.yaml')

// ---------------------------------------------------------------------------
// stdout / stderr capture helpers
// ---------------------------------------------------------------------------

function capture(stream: NodeJS.WriteStream): { chunks: string[]; restore: () => void } {
  const chunks: string[] = []
  const spy = vi.spyOn(stream, 'write').mockImplementation((chunk: unknown) => {
    chunks.push(String(chunk))
    return true
  })
  return { chunks, restore: () => { spy.mockRestore() } }
}

describe('runResolveAction', () => {
  let stdout: ReturnType<typeof capture>
  let stderr: ReturnType<typeof capture>
  let tmpDir: string

  beforeEach(() => {
    stdout = capture(process.stdout)
    stderr = capture(process.stderr)
    tmpDir = mkdtempSync(join(tmpdir(), 'resolve-test-'))
  })

  afterEach(() => {
    stdout.restore()
    stderr.restore()
    rmSync(tmpDir, { recursive: true, force: true })
  })

  it('prints the human report for a no-gpl policy', () => {
    const exitCode = runResolveAction({
      manifestPath: MANIFEST,
      policyPath: NO_GPL_POLICY,
      outputFormat: 'human',
    })

    expect(exitCode).toBe(RESOLVE_EXIT_SUCCESS)
    expect(stderr.chunks).toEqual([])
    expect(stdout.chunks.join('')).toBe(
      [
        'Target: x86_64-unknown-linux-gnu',
        'Extension module filter: no-gpl',
        'Resources policy: filesystem-relative-only:lib',
        '',
        'Included resources (2):',
        '  module-source json',
        '  module-bytecode-request json',
        'Excluded resources (4):',
        '  module-source json.tests',
        '  resource email/architecture.rst',
        '  distribution-resource pip-24.0/METADATA',
        '  path-extension distutils-precedence.pth',
        'Extension modules (4):',
        '  _codecs',
        '  _codecs',
        '  _sqlite3 (variant: system)',
        '  readline (variant: libedit)',
      ].join('\n') + '\n',
    )
  })

  it('uses the default policy and an explicit target for JSON output', () => {
    const exitCode = runResolveAction({
      manifestPath: MANIFEST,
      targetTriple: 'x86_64-unknown-linux-musl',
      outputFormat: 'json',
    })

    expect(exitCode).toBe(RESOLVE_EXIT_SUCCESS)
    const output = JSON.parse(stdout.chunks.join('')) as Record<string, unknown>
    expect(output.target_triple).toBe('x86_64-unknown-linux-musl')
    expect(output.extension_module_filter).toBe('all')
    expect(output.resources_policy).toBe('in-memory-only')
    expect(output.resources).toEqual({
      included: [
        { kind: 'module-source', name: 'json' },
        { kind: 'module-bytecode-request', name: 'json' },
      ],
      excluded: [
        { kind: 'module-source', name: 'json.tests' },
        { kind: 'resource', name: 'email/architecture.rst' },
        { kind: 'distribution-resource', name: 'pip-24.0/METADATA' },
        { kind: 'path-extension', name: 'distutils-precedence.pth' },
      ],
    })
    expect(output.extension_modules).toEqual([
      { name: '_codecs', variant: null },
      { name: '_codecs', variant: null },
      { name: '_sqlite3', variant: 'system' },
      { name: 'readline', variant: 'readline' },
      { name: '_crypt', variant: null },
    ])
  })

  it('exits 2 when no target triple is available', () => {
    const manifestPath = join(tmpDir, 'dist.yaml')
    writeFileSync(manifestPath, 'resources: []\n', 'utf-8')

    const exitCode = runResolveAction({ manifestPath, outputFormat: 'human' })

    expect(exitCode).toBe(RESOLVE_EXIT_USAGE_ERROR)
    expect(stderr.chunks.join('')).toBe(
      'Error: No target triple given; pass --target or set target_triple in the manifest\n',
    )
    expect(stdout.chunks).toEqual([])
  })

  it('exits 2 for an invalid policy value', () => {
    const policyPath = join(tmpDir, 'policy.yaml')
    writeFileSync(policyPath, 'resources_policy: bogus\n', 'utf-8')

    const exitCode = runResolveAction({ manifestPath: MANIFEST, policyPath, outputFormat: 'human' })

    expect(exitCode).toBe(RESOLVE_EXIT_USAGE_ERROR)
    expect(stderr.chunks.join('')).toBe('Error: bogus is not a valid resources policy value\n')
  })

  it('exits 2 for a missing manifest', () => {
    const exitCode = runResolveAction({
      manifestPath: join(tmpDir, 'missing.yaml'),
      outputFormat: 'human',
    })

    expect(exitCode).toBe(RESOLVE_EXIT_USAGE_ERROR)
    expect(stderr.chunks.join('')).toContain('Failed to read distribution manifest')
  })
})
