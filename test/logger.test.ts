/**
 * Tests for the logger utility
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createLogger, childLogger, getDefaultLogLevel, isPrettyMode } from '../src/utils/logger.js'

describe('Logger Utility', () => {
  describe('createLogger', () => {
    it('should create a logger with a given name', () => {
      const log = createLogger('test-module', { pretty: false })
      expect(typeof log.info).toBe('function')
      expect(typeof log.debug).toBe('function')
    })

    it('should create a logger with the specified log level', () => {
      const log = createLogger('test', { level: 'error', pretty: false })
      expect(log.level).toBe('error')
    })
  })

  describe('childLogger', () => {
    it('should create a child logger inheriting parent level', () => {
      const parent = createLogger('parent', { level: 'warn', pretty: false })
      const child = childLogger(parent, { component: 'packaging-policy' })
      expect(child.level).toBe('warn')
    })

    it('should allow child logger to log with bindings', () => {
      const parent = createLogger('parent', { level: 'silent', pretty: false })
      const child = childLogger(parent, { targetTriple: 'x86_64-unknown-linux-gnu' })
      expect(() => { child.info('Child logger test message') }).not.toThrow()
    })
  })

  describe('environment-based configuration', () => {
    let originalEnv: NodeJS.ProcessEnv

    beforeEach(() => {
      originalEnv = { ...process.env }
    })

    afterEach(() => {
      process.env = originalEnv
    })

    it('should use LOG_LEVEL env var when set', () => {
      process.env.LOG_LEVEL = 'warn'
      const log = createLogger('env-test', { pretty: false })
      expect(log.level).toBe('warn')
    })

    it('should use info level in production mode', () => {
      delete process.env.LOG_LEVEL
      process.env.NODE_ENV = 'production'
      expect(getDefaultLogLevel()).toBe('info')
    })

    it('should default to warn without NODE_ENV', () => {
      delete process.env.LOG_LEVEL
      delete process.env.NODE_ENV
      expect(getDefaultLogLevel()).toBe('warn')
    })

    it('should honour LOG_PRETTY over NODE_ENV', () => {
      process.env.NODE_ENV = 'development'
      process.env.LOG_PRETTY = 'false'
      expect(isPrettyMode()).toBe(false)
    })

    it('should pretty print in test mode when LOG_PRETTY is unset', () => {
      delete process.env.LOG_PRETTY
      process.env.NODE_ENV = 'test'
      expect(isPrettyMode()).toBe(true)
    })
  })
})
