import type { Component, EntityId, World } from '../types';

export class WorldImpl implements World {
  private entities: Map<EntityId, Map<string, Component>> = new Map();
  // Ids start at 1 so that 0 stays free as the "no entity" value
  private nextEntityId = 1;

  createEntity(): EntityId {
    const id = this.nextEntityId++;
    this.entities.set(id, new Map());
    return id;
  }

  removeEntity(entityId: EntityId): void {
    this.entities.delete(entityId);
  }

  hasEntity(entityId: EntityId): boolean {
    return this.entities.has(entityId);
  }

  addComponent<T extends Component>(entityId: EntityId, component: T): void {
    const components = this.entities.get(entityId);
    if (components) {
      components.set(component.type, component);
    }
  }

  getComponent<T extends Component>(entityId: EntityId, type: T['type']): T | undefined {
    const components = this.entities.get(entityId);
    return components?.get(type) as T | undefined;
  }

  hasComponent(entityId: EntityId, type: string): boolean {
    const components = this.entities.get(entityId);
    return components?.has(type) ?? false;
  }

  removeComponent(entityId: EntityId, type: string): void {
    const components = this.entities.get(entityId);
    components?.delete(type);
  }

  query(...componentTypes: string[]): EntityId[] {
    const result: EntityId[] = [];
    for (const [entityId, components] of this.entities) {
      if (componentTypes.every((type) => components.has(type))) {
        result.push(entityId);
      }
    }
    return result;
  }

  getAllEntities(): EntityId[] {
    return Array.from(this.entities.keys());
  }

  // Identifiers are never handed out twice, even across a clear
  clear(): void {
    this.entities.clear();
  }
}
