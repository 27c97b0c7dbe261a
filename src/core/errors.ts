/**
 * Error definitions for the packaging policy toolkit
 * Provides a structured error hierarchy for parsing, config and manifest loading
 */

/** Base error class for all packaging policy errors */
export class PackagingError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'PackagingError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PackagingError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when a resources policy string matches none of the known forms */
export class InvalidPolicyValueError extends PackagingError {
  public readonly value: string

  constructor(value: string) {
    super(`${value} is not a valid resources policy value`, 'INVALID_POLICY_VALUE', {
      value,
    })
    this.name = 'InvalidPolicyValueError'
    this.value = value
  }
}

/** Error thrown when an extension module filter string is not one of the known literals */
export class InvalidFilterValueError extends PackagingError {
  public readonly value: string

  constructor(value: string) {
    super(`${value} is not a valid extension module filter`, 'INVALID_FILTER_VALUE', {
      value,
    })
    this.name = 'InvalidFilterValueError'
    this.value = value
  }
}

/** Error thrown when a variant is requested from an extension module group with no variants */
export class EmptyVariantGroupError extends PackagingError {
  constructor(context: Record<string, unknown> = {}) {
    super('Extension module variant group contains no variants', 'EMPTY_VARIANT_GROUP', context)
    this.name = 'EmptyVariantGroupError'
  }
}

/** Error thrown when a packaging policy config file is unreadable or invalid */
export class PolicyConfigError extends PackagingError {
  public readonly details?: string

  constructor(message: string, details?: string, context: Record<string, unknown> = {}) {
    super(message, 'POLICY_CONFIG_ERROR', context)
    this.name = 'PolicyConfigError'
    this.details = details
  }
}

/** Error thrown when a distribution manifest is unreadable or invalid */
export class ManifestError extends PackagingError {
  public readonly details?: string

  constructor(message: string, details?: string, context: Record<string, unknown> = {}) {
    super(message, 'MANIFEST_ERROR', context)
    this.name = 'ManifestError'
    this.details = details
  }
}
