// =============================================================================
// ERROR TAXONOMY
// =============================================================================

export type CacheSimErrorCode = 'config_error' | 'allocation_error' | 'trace_error' | 'share_error'

/**
 * Base class for every fatal error the simulator reports.
 * Malformed trace records and unknown operations are not errors.
 */
export class CacheSimError extends Error {
  constructor(
    message: string,
    public readonly code: CacheSimErrorCode,
    public readonly exitCode: number = 1
  ) {
    super(message)
    this.name = 'CacheSimError'
    // Ensure instanceof works correctly across module boundaries
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export class ConfigError extends CacheSimError {
  constructor(message: string, public readonly issues: string[] = [message]) {
    super(message, 'config_error')
    this.name = 'ConfigError'
  }
}

export class AllocationError extends CacheSimError {
  constructor(message: string) {
    super(message, 'allocation_error')
    this.name = 'AllocationError'
  }
}

export class TraceFileError extends CacheSimError {
  constructor(public readonly path: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : 'unreadable'
    super(`Cannot read trace file ${path}: ${reason}`, 'trace_error')
    this.name = 'TraceFileError'
  }
}

export class ShareStateError extends CacheSimError {
  constructor(message: string) {
    super(message, 'share_error')
    this.name = 'ShareStateError'
  }
}

export function isCacheSimError(error: unknown): error is CacheSimError {
  return error instanceof CacheSimError
}
