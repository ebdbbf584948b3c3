import type { WorldImpl } from '../ecs/World';
import type { EventBusImpl } from '../core/EventBus';
import { type EntityId, type SquadCombatProvider, NO_ENTITY } from '../types';
import type { CombatConfig } from '../data/CombatConfig';
import { type OperationResult, RuleViolationError, fail, succeed } from '../core/errors';
import { chebyshevDistance } from '../core/grid';
import { CombatQueries } from './CombatQueries';
import type { FactionManager } from './FactionManager';
import type { PositionSystem } from './PositionSystem';
import type { TurnManager } from './TurnManager';

export interface SquadAttackResult {
  attackerId: EntityId;
  defenderId: EntityId;
  distance: number;
  totalDamage: number;
  unitsKilled: EntityId[];
  defenderDestroyed: boolean;
}

export class CombatActionSystem {
  constructor(
    private readonly world: WorldImpl,
    private readonly positions: PositionSystem,
    private readonly factions: FactionManager,
    private readonly turns: TurnManager,
    private readonly eventBus: EventBusImpl,
    private readonly config: CombatConfig,
    private readonly provider: SquadCombatProvider
  ) {}

  // Longest reach of any unit in the squad
  getSquadAttackRange(squadId: EntityId): number {
    return this.provider.getAttackRange?.(squadId) ?? this.config.defaultAttackRange;
  }

  /** Ok with the distance when the attack is allowed, otherwise the reason it is not. */
  canSquadAttackWithReason(attackerId: EntityId, defenderId: EntityId): OperationResult<number> {
    if (!this.turns.canSquadAct(attackerId)) {
      return fail(new RuleViolationError('squad has already acted this turn', attackerId));
    }

    const attackerPos = CombatQueries.getSquadMapPosition(this.world, attackerId);
    if (!attackerPos.ok) return attackerPos;
    const defenderPos = CombatQueries.getSquadMapPosition(this.world, defenderId);
    if (!defenderPos.ok) return defenderPos;

    const attackerFaction = CombatQueries.getFactionOwner(this.world, attackerId);
    const defenderFaction = CombatQueries.getFactionOwner(this.world, defenderId);
    if (attackerFaction === NO_ENTITY || defenderFaction === NO_ENTITY) {
      return fail(new RuleViolationError('one or both squads have no faction', attackerId));
    }
    if (attackerFaction === defenderFaction) {
      return fail(new RuleViolationError('cannot attack your own faction', attackerId));
    }

    const distance = chebyshevDistance(attackerPos.value, defenderPos.value);
    const maxRange = this.getSquadAttackRange(attackerId);
    if (distance > maxRange) {
      return fail(
        new RuleViolationError(`target out of range: ${distance} tiles away (max range ${maxRange})`, attackerId)
      );
    }

    return succeed(distance);
  }

  executeAttack(attackerId: EntityId, defenderId: EntityId): OperationResult<SquadAttackResult> {
    const validation = this.canSquadAttackWithReason(attackerId, defenderId);
    if (!validation.ok) return validation;

    const combat = this.provider.resolveAttack(attackerId, defenderId);
    const acted = this.turns.markSquadAsActed(attackerId);
    if (!acted.ok) return acted;

    const defenderDestroyed = this.provider.isSquadDestroyed(defenderId);
    const round = CombatQueries.getCurrentRound(this.world);

    this.eventBus.emit({
      type: 'SquadAttacked',
      round,
      timestamp: Date.now(),
      entityId: attackerId,
      targetId: defenderId,
      data: {
        distance: validation.value,
        totalDamage: combat.totalDamage,
        unitsKilled: [...combat.unitsKilled],
      },
    });

    if (defenderDestroyed) {
      this.eventBus.emit({
        type: 'SquadDestroyed',
        round,
        timestamp: Date.now(),
        entityId: defenderId,
        data: { destroyedBy: attackerId },
      });
      const removed = this.factions.removeSquadFromMap(defenderId);
      if (!removed.ok) return removed;
    }

    return succeed({
      attackerId,
      defenderId,
      distance: validation.value,
      totalDamage: combat.totalDamage,
      unitsKilled: [...combat.unitsKilled],
      defenderDestroyed,
    });
  }

  /** Enemy squads the given squad could attack from where it stands. */
  getSquadsInRange(squadId: EntityId): EntityId[] {
    const position = CombatQueries.getSquadMapPosition(this.world, squadId);
    if (!position.ok) return [];

    const ownFaction = CombatQueries.getFactionOwner(this.world, squadId);
    const range = this.getSquadAttackRange(squadId);

    return this.positions.getEntitiesInRadius(position.value, range).filter((entityId) => {
      if (entityId === squadId || !CombatQueries.isSquad(this.world, entityId)) return false;
      const faction = CombatQueries.getFactionOwner(this.world, entityId);
      return faction !== NO_ENTITY && faction !== ownFaction;
    });
  }
}
