import { type EntityId, type GridPosition, NO_ENTITY } from '../types';
import { type OperationResult, NotFoundError, RuleViolationError, fail, succeed, formatPosition } from '../core/errors';
import { chebyshevDistance, parsePositionKey, positionKey, positionsEqual } from '../core/grid';

/**
 * Spatial grid: cell -> entity ids standing on it, O(1) point lookup.
 * An id lives in at most one cell; cells with no occupants are deleted.
 */
export class PositionSystem {
  private grid: Map<string, EntityId[]> = new Map();
  // Reverse lookup: the cell each id is registered at
  private locations: Map<EntityId, string> = new Map();

  /** First entity at the cell, or NO_ENTITY. */
  getEntityIDAt(pos: GridPosition): EntityId {
    const ids = this.grid.get(positionKey(pos));
    return ids && ids.length > 0 ? ids[0] : NO_ENTITY;
  }

  // Copy, so callers cannot edit the cell
  getAllEntityIDsAt(pos: GridPosition): EntityId[] {
    const ids = this.grid.get(positionKey(pos));
    return ids ? [...ids] : [];
  }

  hasEntityAt(pos: GridPosition): boolean {
    return this.grid.has(positionKey(pos));
  }

  /**
   * No-op when the entity is already registered at this cell. Fails when it
   * stands on another cell; relocation goes through moveEntity.
   */
  addEntity(entityId: EntityId, pos: GridPosition): OperationResult {
    const key = positionKey(pos);
    const registeredAt = this.locations.get(entityId);
    if (registeredAt !== undefined && registeredAt !== key) {
      return fail(
        new RuleViolationError(
          `entity ${entityId} is already at ${formatPosition(parsePositionKey(registeredAt))}`,
          entityId
        )
      );
    }

    const ids = this.grid.get(key);
    if (!ids) {
      this.grid.set(key, [entityId]);
    } else if (!ids.includes(entityId)) {
      ids.push(entityId);
    }
    this.locations.set(entityId, key);
    return succeed();
  }

  removeEntity(entityId: EntityId, pos: GridPosition): OperationResult {
    const key = positionKey(pos);
    const ids = this.grid.get(key);
    if (!ids) {
      return fail(new NotFoundError(`no entities at position ${formatPosition(pos)}`, { entityId, position: pos }));
    }

    const index = ids.indexOf(entityId);
    if (index < 0) {
      return fail(
        new NotFoundError(`entity ${entityId} not found at position ${formatPosition(pos)}`, {
          entityId,
          position: pos,
        })
      );
    }

    ids.splice(index, 1);
    if (ids.length === 0) {
      this.grid.delete(key);
    }
    this.locations.delete(entityId);
    return succeed();
  }

  /** Remove then add; when the removal fails nothing changes. */
  moveEntity(entityId: EntityId, oldPos: GridPosition, newPos: GridPosition): OperationResult {
    if (positionsEqual(oldPos, newPos)) {
      return succeed();
    }

    const removed = this.removeEntity(entityId, oldPos);
    if (!removed.ok) {
      return removed;
    }

    return this.addEntity(entityId, newPos);
  }

  getEntityCount(): number {
    let count = 0;
    for (const ids of this.grid.values()) {
      count += ids.length;
    }
    return count;
  }

  getOccupiedPositions(): GridPosition[] {
    return Array.from(this.grid.keys(), parsePositionKey);
  }

  /**
   * Every id within Chebyshev distance `radius` of `center`, cell by cell
   * over the (2r+1)^2 bounding square.
   */
  getEntitiesInRadius(center: GridPosition, radius: number): EntityId[] {
    const entities: EntityId[] = [];

    for (let x = center.x - radius; x <= center.x + radius; x++) {
      for (let y = center.y - radius; y <= center.y + radius; y++) {
        const pos = { x, y };
        if (chebyshevDistance(center, pos) <= radius) {
          entities.push(...this.getAllEntityIDsAt(pos));
        }
      }
    }

    return entities;
  }

  clear(): void {
    this.grid = new Map();
    this.locations = new Map();
  }
}
