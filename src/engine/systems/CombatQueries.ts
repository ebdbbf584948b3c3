import type { WorldImpl } from '../ecs/World';
import { type EntityId, type GridPosition, NO_ENTITY } from '../types';
import type {
  ActionStateComponent,
  FactionComponent,
  MapPositionComponent,
  SquadComponent,
  TurnStateComponent,
} from '../components';
import { type OperationResult, NotFoundError, fail, succeed } from '../core/errors';
import { positionsEqual } from '../core/grid';

/**
 * Read-only lookups over the entity store. Records are found by scanning,
 * which is fine at tens of squads per combat.
 */
export class CombatQueries {
  static findFactionEntity(world: WorldImpl, factionId: EntityId): EntityId | undefined {
    return world.query('faction').find((entityId) => {
      const faction = world.getComponent<FactionComponent>(entityId, 'faction');
      return faction?.factionId === factionId;
    });
  }

  static findFaction(world: WorldImpl, factionId: EntityId): FactionComponent | undefined {
    const entityId = this.findFactionEntity(world, factionId);
    return entityId === undefined ? undefined : world.getComponent<FactionComponent>(entityId, 'faction');
  }

  static getFactionIds(world: WorldImpl): EntityId[] {
    const ids: EntityId[] = [];
    for (const entityId of world.query('faction')) {
      const faction = world.getComponent<FactionComponent>(entityId, 'faction');
      if (faction) ids.push(faction.factionId);
    }
    return ids;
  }

  // Only one should exist
  static findTurnStateEntity(world: WorldImpl): EntityId | undefined {
    return world.query('turnState')[0];
  }

  static findTurnState(world: WorldImpl): TurnStateComponent | undefined {
    const entityId = this.findTurnStateEntity(world);
    return entityId === undefined ? undefined : world.getComponent<TurnStateComponent>(entityId, 'turnState');
  }

  static getCurrentRound(world: WorldImpl): number {
    return this.findTurnState(world)?.currentRound ?? 0;
  }

  static findMapPositionEntity(world: WorldImpl, squadId: EntityId): EntityId | undefined {
    return world.query('mapPosition').find((entityId) => {
      const mapPos = world.getComponent<MapPositionComponent>(entityId, 'mapPosition');
      return mapPos?.squadId === squadId;
    });
  }

  static findMapPosition(world: WorldImpl, squadId: EntityId): MapPositionComponent | undefined {
    const entityId = this.findMapPositionEntity(world, squadId);
    return entityId === undefined ? undefined : world.getComponent<MapPositionComponent>(entityId, 'mapPosition');
  }

  static findMapPositionsByFaction(world: WorldImpl, factionId: EntityId): MapPositionComponent[] {
    const result: MapPositionComponent[] = [];
    for (const entityId of world.query('mapPosition')) {
      const mapPos = world.getComponent<MapPositionComponent>(entityId, 'mapPosition');
      if (mapPos && mapPos.factionId === factionId) {
        result.push(mapPos);
      }
    }
    return result;
  }

  static findActionStateEntity(world: WorldImpl, squadId: EntityId): EntityId | undefined {
    return world.query('actionState').find((entityId) => {
      const actionState = world.getComponent<ActionStateComponent>(entityId, 'actionState');
      return actionState?.squadId === squadId;
    });
  }

  static findActionState(world: WorldImpl, squadId: EntityId): ActionStateComponent | undefined {
    const entityId = this.findActionStateEntity(world, squadId);
    return entityId === undefined ? undefined : world.getComponent<ActionStateComponent>(entityId, 'actionState');
  }

  /** Owning faction read off the squad's map position; NO_ENTITY when off the map. */
  static getFactionOwner(world: WorldImpl, squadId: EntityId): EntityId {
    return this.findMapPosition(world, squadId)?.factionId ?? NO_ENTITY;
  }

  static getSquadMapPosition(world: WorldImpl, squadId: EntityId): OperationResult<GridPosition> {
    const mapPos = this.findMapPosition(world, squadId);
    if (!mapPos) {
      return fail(new NotFoundError(`squad ${squadId} not on map`, { entityId: squadId }));
    }
    return succeed({ ...mapPos.position });
  }

  static getSquadsForFaction(world: WorldImpl, factionId: EntityId): EntityId[] {
    return this.findMapPositionsByFaction(world, factionId).map((mapPos) => mapPos.squadId);
  }

  static getSquadAtPosition(world: WorldImpl, pos: GridPosition): EntityId {
    for (const entityId of world.query('mapPosition')) {
      const mapPos = world.getComponent<MapPositionComponent>(entityId, 'mapPosition');
      if (mapPos && positionsEqual(mapPos.position, pos)) {
        return mapPos.squadId;
      }
    }
    return NO_ENTITY;
  }

  static isSquad(world: WorldImpl, entityId: EntityId): boolean {
    return this.findMapPositionEntity(world, entityId) !== undefined;
  }

  static getSquadName(world: WorldImpl, squadId: EntityId): string {
    return world.getComponent<SquadComponent>(squadId, 'squad')?.name ?? 'Unknown';
  }
}
