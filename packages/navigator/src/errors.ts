import type { CollectionName, EntityKind } from './types';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Errors raised while interpreting a command line.
 * Nested failures are wrapped so the message reads as one chain, e.g.
 * `Error interpreting routes command: Error executing command for route R1: Invalid command: foo`
 */
export class InterpreterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InterpreterError';
  }
}

export class InvalidCommandError extends InterpreterError {
  constructor(readonly command: string) {
    super(`Invalid command: ${command}`);
    this.name = 'InvalidCommandError';
  }
}

/** A path stopped at a collection or entity without naming an action */
export class SubcommandRequiredError extends InterpreterError {
  constructor(readonly target: string) {
    super(`Subcommand required for ${target}`);
    this.name = 'SubcommandRequiredError';
  }
}

export class CollectionCommandError extends InterpreterError {
  constructor(
    readonly collection: CollectionName,
    cause: Error
  ) {
    super(`Error interpreting ${collection} command: ${cause.message}`, { cause });
    this.name = 'CollectionCommandError';
  }
}

export class EntityProjectionError extends InterpreterError {
  constructor(
    readonly kind: EntityKind,
    readonly entityId: string,
    cause: Error
  ) {
    super(`Error getting ${kind} ${entityId}: ${cause.message}`, { cause });
    this.name = 'EntityProjectionError';
  }
}

export class EntityCommandError extends InterpreterError {
  constructor(
    readonly kind: EntityKind,
    readonly entityId: string,
    cause: Error
  ) {
    super(`Error executing command for ${kind} ${entityId}: ${cause.message}`, { cause });
    this.name = 'EntityCommandError';
  }
}

export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolArgumentError';
  }
}
