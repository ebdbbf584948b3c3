// Entity is an opaque positive integer assigned by the store; 0 means "no entity"
export type EntityId = number;

export const NO_ENTITY: EntityId = 0;

// Base component interface - all components must have a type
export interface Component {
  readonly type: string;
}

// Discrete grid cell
export interface GridPosition {
  x: number;
  y: number;
}

// Forward declaration for World (implemented in ecs/)
export interface World {
  createEntity(): EntityId;
  removeEntity(entityId: EntityId): void;
  addComponent<T extends Component>(entityId: EntityId, component: T): void;
  getComponent<T extends Component>(entityId: EntityId, type: T['type']): T | undefined;
  hasComponent(entityId: EntityId, type: string): boolean;
  removeComponent(entityId: EntityId, type: string): void;
  query(...componentTypes: string[]): EntityId[];
  getAllEntities(): EntityId[];
  clear(): void;
}

// Game event types
export type GameEventType =
  | 'CombatStarted'
  | 'RoundStarted'
  | 'FactionTurnStarted'
  | 'FactionTurnEnded'
  | 'CombatResolving'
  | 'CombatEnded'
  | 'ActionQueued'
  | 'ActionDeduplicated'
  | 'ActionExecuted'
  | 'ActionSkipped'
  | 'ActionRejected'
  | 'SquadMoved'
  | 'SquadAttacked'
  | 'SquadDestroyed'
  | 'SquadRemovedFromMap';

// Game event structure. Scheduler events carry no round.
export interface GameEvent {
  type: GameEventType;
  round?: number;
  timestamp: number;
  entityId?: EntityId;
  targetId?: EntityId;
  data: Record<string, unknown>;
}

// Outcome of one squad attacking another, as reported by the combat collaborator
export interface SquadCombatResult {
  totalDamage: number;
  unitsKilled: EntityId[];
}

/**
 * Squad stats and damage resolution live outside this core.
 * Missing speed or range falls back to the configured defaults.
 */
export interface SquadCombatProvider {
  getMovementSpeed?(squadId: EntityId): number | undefined;
  getAttackRange?(squadId: EntityId): number | undefined;
  resolveAttack(attackerId: EntityId, defenderId: EntityId): SquadCombatResult;
  isSquadDestroyed(squadId: EntityId): boolean;
}
