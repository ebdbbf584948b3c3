import type { EntityId, GridPosition } from '../types';
import type { WorldImpl } from '../ecs/World';
import type { PositionSystem } from '../systems/PositionSystem';

// Handles an action's behaviour may need besides its own fields
export interface ActionContext {
  world: WorldImpl;
  positions: PositionSystem;
}

export type ActionKind = 'movement' | 'attack' | 'meleeAttack' | 'rangedAttack' | 'pickupItem';

export type MovementBehavior = (context: ActionContext, actorId: EntityId, dx: number, dy: number) => void;

export type AttackBehavior = (context: ActionContext, attackerId: EntityId, defenderId: EntityId) => void;

export type PlayerActionArg = number | GridPosition;

export type PlayerActionBehavior = (
  context: ActionContext,
  actorId: EntityId,
  args: readonly PlayerActionArg[]
) => void;

export interface MovementAction {
  readonly variant: 'movement';
  readonly context: ActionContext;
  readonly actorId: EntityId;
  readonly dx: number;
  readonly dy: number;
  readonly behavior: MovementBehavior | null;
}

export interface SingleTargetAttackAction {
  readonly variant: 'singleTargetAttack';
  readonly context: ActionContext;
  readonly attackerId: EntityId;
  readonly defenderId: EntityId;
  readonly behavior: AttackBehavior | null;
}

export interface PlayerAction {
  readonly variant: 'playerAction';
  readonly context: ActionContext;
  readonly actorId: EntityId;
  readonly args: readonly PlayerActionArg[];
  readonly behavior: PlayerActionBehavior | null;
}

export type Action = MovementAction | SingleTargetAttackAction | PlayerAction;

export function createMovementAction(
  context: ActionContext,
  actorId: EntityId,
  dx: number,
  dy: number,
  behavior: MovementBehavior | null
): MovementAction {
  const action: MovementAction = { variant: 'movement', context, actorId, dx, dy, behavior };
  return Object.freeze(action);
}

export function createAttackAction(
  context: ActionContext,
  attackerId: EntityId,
  defenderId: EntityId,
  behavior: AttackBehavior | null
): SingleTargetAttackAction {
  const action: SingleTargetAttackAction = {
    variant: 'singleTargetAttack',
    context,
    attackerId,
    defenderId,
    behavior,
  };
  return Object.freeze(action);
}

export function createPlayerAction(
  context: ActionContext,
  actorId: EntityId,
  args: readonly PlayerActionArg[],
  behavior: PlayerActionBehavior | null
): PlayerAction {
  const action: PlayerAction = {
    variant: 'playerAction',
    context,
    actorId,
    args: Object.freeze([...args]),
    behavior,
  };
  return Object.freeze(action);
}

/** The entity the action is performed by. */
export function getActionActor(action: Action): EntityId {
  switch (action.variant) {
    case 'movement':
    case 'playerAction':
      return action.actorId;
    case 'singleTargetAttack':
      return action.attackerId;
  }
}

/**
 * Invoke the action's behaviour with its embedded arguments.
 * Returns false, without throwing, when the action carries no behaviour.
 */
export function executeAction(action: Action): boolean {
  switch (action.variant) {
    case 'movement':
      if (!action.behavior) return false;
      action.behavior(action.context, action.actorId, action.dx, action.dy);
      return true;
    case 'singleTargetAttack':
      if (!action.behavior) return false;
      action.behavior(action.context, action.attackerId, action.defenderId);
      return true;
    case 'playerAction':
      if (!action.behavior) return false;
      action.behavior(action.context, action.actorId, action.args);
      return true;
  }
}
