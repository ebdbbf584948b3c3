import type { WorldImpl } from '../ecs/World';
import type { EventBusImpl } from '../core/EventBus';
import { type EntityId, type GridPosition, type SquadCombatProvider, NO_ENTITY } from '../types';
import type { CombatConfig } from '../data/CombatConfig';
import {
  type OperationResult,
  NotFoundError,
  RuleViolationError,
  fail,
  formatPosition,
  succeed,
} from '../core/errors';
import { chebyshevDistance, isWithinBounds } from '../core/grid';
import { CombatQueries } from './CombatQueries';
import type { FactionManager } from './FactionManager';
import type { PositionSystem } from './PositionSystem';
import type { TurnManager } from './TurnManager';

export interface SquadMoveResult {
  from: GridPosition;
  to: GridPosition;
  movementCost: number;
  movementRemaining: number;
}

export interface PlannedMove {
  from: GridPosition;
  movementCost: number;
}

export class CombatMovementSystem {
  constructor(
    private readonly world: WorldImpl,
    private readonly positions: PositionSystem,
    private readonly factions: FactionManager,
    private readonly turns: TurnManager,
    private readonly eventBus: EventBusImpl,
    private readonly config: CombatConfig,
    private readonly provider?: SquadCombatProvider
  ) {}

  // Slowest unit's speed, as reported by the squad collaborator
  getSquadMovementSpeed(squadId: EntityId): number {
    return this.provider?.getMovementSpeed?.(squadId) ?? this.config.defaultMovementSpeed;
  }

  getSquadPosition(squadId: EntityId): OperationResult<GridPosition> {
    return CombatQueries.getSquadMapPosition(this.world, squadId);
  }

  /** Empty tiles and tiles held by friendly squads; enemies and other occupants block. */
  canMoveTo(squadId: EntityId, target: GridPosition): boolean {
    if (this.config.mapSize && !isWithinBounds(target, this.config.mapSize)) {
      return false;
    }

    const occupyingId = this.positions.getEntityIDAt(target);
    if (occupyingId === NO_ENTITY) return true;

    if (!CombatQueries.isSquad(this.world, occupyingId)) return false;

    const occupyingFaction = CombatQueries.getFactionOwner(this.world, occupyingId);
    const squadFaction = CombatQueries.getFactionOwner(this.world, squadId);
    return occupyingFaction === squadFaction;
  }

  /**
   * Every rule moveSquad applies, without moving. Ok with the squad's current
   * tile and the movement the step would cost.
   */
  canSquadMoveWithReason(squadId: EntityId, target: GridPosition): OperationResult<PlannedMove> {
    const actionState = CombatQueries.findActionState(this.world, squadId);
    if (!actionState) {
      return fail(new NotFoundError(`no action state for squad ${squadId}`, { entityId: squadId }));
    }
    if (!this.turns.canSquadMove(squadId)) {
      return fail(new RuleViolationError('squad has no movement remaining', squadId));
    }

    const current = this.getSquadPosition(squadId);
    if (!current.ok) return current;
    const from = current.value;

    const movementCost = chebyshevDistance(from, target);
    if (movementCost === 0) {
      return fail(new RuleViolationError(`squad ${squadId} is already at ${formatPosition(target)}`, squadId));
    }
    if (actionState.movementRemaining < movementCost) {
      return fail(
        new RuleViolationError(
          `insufficient movement: need ${movementCost}, have ${actionState.movementRemaining}`,
          squadId
        )
      );
    }
    if (!this.canMoveTo(squadId, target)) {
      return fail(new RuleViolationError(`cannot move to ${formatPosition(target)}`, squadId));
    }

    return succeed({ from, movementCost });
  }

  moveSquad(squadId: EntityId, target: GridPosition): OperationResult<SquadMoveResult> {
    const planned = this.canSquadMoveWithReason(squadId, target);
    if (!planned.ok) return planned;
    const { from, movementCost } = planned.value;

    const relocated = this.factions.relocateSquad(squadId, target);
    if (!relocated.ok) return relocated;

    const decremented = this.turns.decrementMovementRemaining(squadId, movementCost);
    if (!decremented.ok) return decremented;
    const marked = this.turns.markSquadAsMoved(squadId);
    if (!marked.ok) return marked;

    const movementRemaining = CombatQueries.findActionState(this.world, squadId)?.movementRemaining ?? 0;
    this.eventBus.emit({
      type: 'SquadMoved',
      round: CombatQueries.getCurrentRound(this.world),
      timestamp: Date.now(),
      entityId: squadId,
      data: { from, to: { ...target }, movementCost, movementRemaining },
    });

    return succeed({ from, to: { ...target }, movementCost, movementRemaining });
  }

  getValidMovementTiles(squadId: EntityId): GridPosition[] {
    const current = this.getSquadPosition(squadId);
    if (!current.ok) return [];

    const movementRange = CombatQueries.findActionState(this.world, squadId)?.movementRemaining ?? 0;
    if (movementRange <= 0) return [];

    const from = current.value;
    const validTiles: GridPosition[] = [];
    for (let x = from.x - movementRange; x <= from.x + movementRange; x++) {
      for (let y = from.y - movementRange; y <= from.y + movementRange; y++) {
        const tile = { x, y };
        const distance = chebyshevDistance(from, tile);
        if (distance === 0 || distance > movementRange) continue;
        if (this.canMoveTo(squadId, tile)) {
          validTiles.push(tile);
        }
      }
    }
    return validTiles;
  }
}
