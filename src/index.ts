export { CombatService } from './engine/core/CombatService';
export type { CombatServiceOptions, FactionTurnResult } from './engine/core/CombatService';
export { ActionController } from './engine/core/ActionController';
export type { QueueHandle, QueuePriority } from './engine/core/ActionController';
export { ActionQueue } from './engine/core/ActionQueue';
export type { ActionQueueEntry, AddActionOutcome, ExecutionRecord } from './engine/core/ActionQueue';
export { EventBusImpl } from './engine/core/EventBus';
export type { EventBus, GameEventListener } from './engine/core/EventBus';
export { SeededRandom, shuffle } from './engine/core/SeededRandom';
export type { RandomSource, RandomState } from './engine/core/SeededRandom';
export * from './engine/core/errors';
export * from './engine/core/grid';
export * from './engine/actions';
export { WorldImpl } from './engine/ecs/World';
export { CombatConfigSchema, parseCombatConfig } from './engine/data/CombatConfig';
export type { CombatConfig, CombatConfigInput } from './engine/data/CombatConfig';
export { PositionSystem } from './engine/systems/PositionSystem';
export { FactionManager } from './engine/systems/FactionManager';
export { TurnManager } from './engine/systems/TurnManager';
export type { CombatOutcome, TurnAdvanceResult, TurnManagerOptions } from './engine/systems/TurnManager';
export { CombatMovementSystem } from './engine/systems/CombatMovementSystem';
export type { PlannedMove, SquadMoveResult } from './engine/systems/CombatMovementSystem';
export { CombatActionSystem } from './engine/systems/CombatActionSystem';
export type { SquadAttackResult } from './engine/systems/CombatActionSystem';
export { CombatQueries } from './engine/systems/CombatQueries';
export type * from './engine/components';
export * from './engine/types';
