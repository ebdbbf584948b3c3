import type { EntityId, GridPosition } from '../types';

export class CombatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Programmer error. Thrown, never returned; the current step is abandoned.
 */
export class PreconditionError extends CombatError {}

export class InvalidActionCostError extends PreconditionError {
  constructor(readonly cost: number) {
    super(`action cost must be positive, got ${cost}`);
  }
}

export interface NotFoundContext {
  entityId?: EntityId;
  position?: GridPosition;
}

/** A record, cell entry or entity that the operation needed is missing. */
export class NotFoundError extends CombatError {
  readonly entityId?: EntityId;
  readonly position?: GridPosition;

  constructor(message: string, context: NotFoundContext = {}) {
    super(message);
    this.entityId = context.entityId;
    this.position = context.position;
  }
}

/** A gameplay rule rejected the operation (wrong faction, out of range, ...). */
export class RuleViolationError extends CombatError {
  constructor(
    message: string,
    readonly entityId?: EntityId
  ) {
    super(message);
  }
}

export type OperationResult<T = void> =
  | { ok: true; value: T }
  | { ok: false; error: CombatError };

export function succeed(): OperationResult<void>;
export function succeed<T>(value: T): OperationResult<T>;
export function succeed<T>(value?: T): OperationResult<T | undefined> {
  return { ok: true, value };
}

export function fail<T = void>(error: CombatError): OperationResult<T> {
  return { ok: false, error };
}

export function formatPosition(pos: GridPosition): string {
  return `(${pos.x}, ${pos.y})`;
}
