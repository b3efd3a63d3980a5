import type { IModuleMetadata } from '@actionindex/types';

export class ActionIndexError extends Error {
  constructor(public readonly message: string, public readonly code = 'INTERNAL_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'ActionIndexError';
  }
}

export class ValidationError extends ActionIndexError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when a stored trace payload does not match the wire format.
 *
 * `details` carries the zod issue list so the failure reason can be persisted
 * next to the trace.
 */
export class DecodeError extends ActionIndexError {
  constructor(message = 'Trace payload could not be decoded', details?: unknown) {
    super(message, 'DECODE_ERROR', details);
    this.name = 'DecodeError';
  }
}

export type ModulePhase = 'init' | 'run';

/**
 * Raised when a module fails one of its lifecycle phases during bootstrap.
 */
export class ModuleLifecycleError extends ActionIndexError {
  constructor(public readonly module: IModuleMetadata, public readonly phase: ModulePhase, public readonly reason: unknown) {
    super(`${module.name} module failed to ${phase}: ${errorMessage(reason)}`, 'MODULE_LIFECYCLE_ERROR', { module, phase });
    this.name = 'ModuleLifecycleError';
  }
}

/**
 * Run one lifecycle phase of a module, attributing any failure to it.
 *
 * @throws {ModuleLifecycleError} Wrapping whatever the phase threw
 */
export async function runModulePhase<T>(module: IModuleMetadata, phase: ModulePhase, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw new ModuleLifecycleError(module, phase, error);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
