import type { WorldImpl } from '../ecs/World';
import type { EventBusImpl } from '../core/EventBus';
import type { EntityId, GridPosition } from '../types';
import type { FactionComponent, MapPositionComponent, SquadComponent } from '../components';
import { type OperationResult, NotFoundError, RuleViolationError, fail, succeed } from '../core/errors';
import { CombatQueries } from './CombatQueries';
import type { PositionSystem } from './PositionSystem';

/**
 * Owns faction records and squad placement. Every MapPosition write goes
 * through here so the record and the spatial index never disagree.
 */
export class FactionManager {
  constructor(
    private readonly world: WorldImpl,
    private readonly positions: PositionSystem,
    private readonly eventBus: EventBusImpl
  ) {}

  createFaction(name: string, isPlayerControlled: boolean): EntityId {
    const factionId = this.world.createEntity();
    this.world.addComponent<FactionComponent>(factionId, {
      type: 'faction',
      factionId,
      name,
      isPlayerControlled,
    });
    return factionId;
  }

  /** Creates a squad entity for callers that do not bring their own. */
  createSquad(name: string): EntityId {
    const squadId = this.world.createEntity();
    this.world.addComponent<SquadComponent>(squadId, { type: 'squad', name });
    return squadId;
  }

  addSquadToFaction(factionId: EntityId, squadId: EntityId, position: GridPosition): OperationResult {
    if (!CombatQueries.findFaction(this.world, factionId)) {
      return fail(new NotFoundError(`faction ${factionId} not found`, { entityId: factionId }));
    }
    if (!this.world.hasComponent(squadId, 'squad')) {
      return fail(new NotFoundError(`squad ${squadId} not found`, { entityId: squadId }));
    }

    const mapPosEntity = CombatQueries.findMapPositionEntity(this.world, squadId);
    if (mapPosEntity === undefined) {
      const placed = this.positions.addEntity(squadId, position);
      if (!placed.ok) {
        return placed;
      }
      const entity = this.world.createEntity();
      this.world.addComponent<MapPositionComponent>(entity, {
        type: 'mapPosition',
        squadId,
        factionId,
        position: { ...position },
      });
      return succeed();
    }

    // Already placed: move it, then switch owner
    const relocated = this.relocateSquad(squadId, position);
    if (!relocated.ok) {
      return relocated;
    }
    const mapPos = this.world.getComponent<MapPositionComponent>(mapPosEntity, 'mapPosition');
    if (mapPos) {
      this.world.addComponent<MapPositionComponent>(mapPosEntity, { ...mapPos, factionId });
    }
    return succeed();
  }

  relocateSquad(squadId: EntityId, position: GridPosition): OperationResult {
    const mapPosEntity = CombatQueries.findMapPositionEntity(this.world, squadId);
    const mapPos =
      mapPosEntity === undefined
        ? undefined
        : this.world.getComponent<MapPositionComponent>(mapPosEntity, 'mapPosition');
    if (mapPosEntity === undefined || !mapPos) {
      return fail(new NotFoundError(`squad ${squadId} not on map`, { entityId: squadId }));
    }

    const moved = this.positions.moveEntity(squadId, mapPos.position, position);
    if (!moved.ok) {
      return moved;
    }

    this.world.addComponent<MapPositionComponent>(mapPosEntity, { ...mapPos, position: { ...position } });
    return succeed();
  }

  removeSquadFromFaction(factionId: EntityId, squadId: EntityId): OperationResult {
    const mapPos = CombatQueries.findMapPosition(this.world, squadId);
    if (!mapPos) {
      return fail(new NotFoundError(`squad ${squadId} is not in combat`, { entityId: squadId }));
    }
    if (mapPos.factionId !== factionId) {
      return fail(new RuleViolationError(`squad ${squadId} does not belong to faction ${factionId}`, squadId));
    }
    return this.removeSquadFromMap(squadId);
  }

  /** Drop the squad's map record and its spatial entry (death, retreat, leaving the map). */
  removeSquadFromMap(squadId: EntityId): OperationResult {
    const mapPosEntity = CombatQueries.findMapPositionEntity(this.world, squadId);
    const mapPos =
      mapPosEntity === undefined
        ? undefined
        : this.world.getComponent<MapPositionComponent>(mapPosEntity, 'mapPosition');
    if (mapPosEntity === undefined || !mapPos) {
      return fail(new NotFoundError(`squad ${squadId} not on map`, { entityId: squadId }));
    }

    // Index first: the record only goes once the index has let go of the squad
    const removed = this.positions.removeEntity(squadId, mapPos.position);
    if (!removed.ok) {
      return removed;
    }
    this.world.removeEntity(mapPosEntity);

    this.eventBus.emit({
      type: 'SquadRemovedFromMap',
      round: CombatQueries.getCurrentRound(this.world),
      timestamp: Date.now(),
      entityId: squadId,
      data: { factionId: mapPos.factionId, position: { ...mapPos.position } },
    });

    return succeed();
  }

  getFactionSquads(factionId: EntityId): EntityId[] {
    return CombatQueries.getSquadsForFaction(this.world, factionId);
  }

  getFactionName(factionId: EntityId): string {
    return CombatQueries.findFaction(this.world, factionId)?.name ?? 'Unknown';
  }

  getFactionIds(): EntityId[] {
    return CombatQueries.getFactionIds(this.world);
  }

  isPlayerControlled(factionId: EntityId): boolean {
    return CombatQueries.findFaction(this.world, factionId)?.isPlayerControlled ?? false;
  }
}
