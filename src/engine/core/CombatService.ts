import { WorldImpl } from '../ecs/World';
import { EventBusImpl } from './EventBus';
import { ActionController } from './ActionController';
import { type AddActionOutcome, ActionQueue, type ExecutionRecord } from './ActionQueue';
import { type RandomSource, SeededRandom } from './SeededRandom';
import {
  type CombatError,
  type OperationResult,
  RuleViolationError,
  fail,
  succeed,
} from './errors';
import {
  type Action,
  type ActionContext,
  type ActionKind,
  type PlayerActionArg,
  type PlayerActionBehavior,
  createAttackAction,
  createMovementAction,
  createPlayerAction,
} from '../actions';
import { type EntityId, type GridPosition, type SquadCombatProvider, NO_ENTITY } from '../types';
import { type CombatConfig, type CombatConfigInput, parseCombatConfig } from '../data/CombatConfig';
import { PositionSystem } from '../systems/PositionSystem';
import { FactionManager } from '../systems/FactionManager';
import { type CombatOutcome, type TurnAdvanceResult, TurnManager } from '../systems/TurnManager';
import { CombatMovementSystem, type SquadMoveResult } from '../systems/CombatMovementSystem';
import { CombatActionSystem, type SquadAttackResult } from '../systems/CombatActionSystem';
import { CombatQueries } from '../systems/CombatQueries';

export interface CombatServiceOptions {
  config: CombatConfigInput;
  provider: SquadCombatProvider;
  /** Shared entity store; a fresh one is created when omitted. */
  world?: WorldImpl;
  eventBus?: EventBusImpl;
  random?: RandomSource;
}

export interface FactionTurnResult extends TurnAdvanceResult {
  outcome?: CombatOutcome;
}

/**
 * One combat: owns the scheduler, spatial index, turn machine and the
 * systems acting on them. Run several combats with several services,
 * never by sharing one.
 *
 * Pending actions are cleared and empty queues cleaned only at faction-turn
 * boundaries and inside runPendingActions(), where no submission can land
 * between two steps.
 */
export class CombatService {
  private readonly config: CombatConfig;
  private readonly world: WorldImpl;
  private readonly eventBus: EventBusImpl;
  private readonly positions: PositionSystem;
  private readonly controller: ActionController;
  private readonly factions: FactionManager;
  private readonly turns: TurnManager;
  private readonly movement: CombatMovementSystem;
  private readonly actions: CombatActionSystem;
  private readonly actionContext: ActionContext;
  private squadQueues: Map<EntityId, ActionQueue> = new Map();

  constructor(options: CombatServiceOptions) {
    this.config = parseCombatConfig(options.config);
    this.world = options.world ?? new WorldImpl();
    this.eventBus = options.eventBus ?? new EventBusImpl();
    this.positions = new PositionSystem();
    this.controller = new ActionController(this.eventBus);
    this.factions = new FactionManager(this.world, this.positions, this.eventBus);

    const provider = options.provider;
    this.turns = new TurnManager(this.world, this.eventBus, {
      random: options.random ?? new SeededRandom(this.config.seed),
      getMovementSpeed: (squadId) => this.movement.getSquadMovementSpeed(squadId),
      isSquadDestroyed: (squadId) => provider.isSquadDestroyed(squadId),
    });
    this.movement = new CombatMovementSystem(
      this.world,
      this.positions,
      this.factions,
      this.turns,
      this.eventBus,
      this.config,
      provider
    );
    this.actions = new CombatActionSystem(
      this.world,
      this.positions,
      this.factions,
      this.turns,
      this.eventBus,
      this.config,
      provider
    );
    this.actionContext = { world: this.world, positions: this.positions };
  }

  // Setup
  createFaction(name: string, isPlayerControlled: boolean): EntityId {
    return this.factions.createFaction(name, isPlayerControlled);
  }

  createSquad(name: string): EntityId {
    return this.factions.createSquad(name);
  }

  addSquadToFaction(factionId: EntityId, squadId: EntityId, position: GridPosition): OperationResult {
    return this.factions.addSquadToFaction(factionId, squadId, position);
  }

  /** Starts with every known faction when none are given. */
  startCombat(factionIds: EntityId[] = this.factions.getFactionIds()): OperationResult {
    this.resetScheduler();
    const started = this.turns.initializeCombat(factionIds);
    if (started.ok) {
      this.restoreQueuesOf(this.turns.getCurrentFaction());
    }
    return started;
  }

  // Queued actions
  queueSquadMove(squadId: EntityId, target: GridPosition): OperationResult<AddActionOutcome> {
    const authorized = this.authorize(squadId);
    if (!authorized.ok) return authorized;
    const planned = this.movement.canSquadMoveWithReason(squadId, target);
    if (!planned.ok) return planned;
    const { from, movementCost: distance } = planned.value;

    // The offsets record the request; execution still heads for the tile asked for
    const destination = { ...target };
    const action = createMovementAction(
      this.actionContext,
      squadId,
      destination.x - from.x,
      destination.y - from.y,
      (_context, actorId) => {
        const moved = this.movement.moveSquad(actorId, destination);
        if (!moved.ok) this.reportRejection(actorId, 'movement', moved.error);
      }
    );

    return succeed(this.submit(squadId, action, distance * this.config.movementCostPerTile, 'movement'));
  }

  queueSquadAttack(squadId: EntityId, targetId: EntityId): OperationResult<AddActionOutcome> {
    const authorized = this.authorize(squadId);
    if (!authorized.ok) return authorized;
    if (!this.turns.canSquadAct(squadId)) {
      return fail(new RuleViolationError('squad has already acted this turn', squadId));
    }

    const action = createAttackAction(this.actionContext, squadId, targetId, (_context, attackerId, defenderId) => {
      const attacked = this.resolveAttack(attackerId, defenderId);
      if (!attacked.ok) this.reportRejection(attackerId, 'attack', attacked.error);
    });

    return succeed(this.submit(squadId, action, this.config.attackCost, 'attack'));
  }

  /** Anything else a squad can do (picking up an item, ...); the behaviour is the caller's. */
  queueSquadAction(
    squadId: EntityId,
    kind: ActionKind,
    cost: number,
    args: readonly PlayerActionArg[],
    behavior: PlayerActionBehavior | null
  ): OperationResult<AddActionOutcome> {
    const authorized = this.authorize(squadId);
    if (!authorized.ok) return authorized;

    const action = createPlayerAction(this.actionContext, squadId, args, behavior);
    return succeed(this.submit(squadId, action, cost, kind));
  }

  /** One simulation step. */
  step(): ExecutionRecord | null {
    return this.controller.executeFirst();
  }

  /** Steps until no queue has anything pending. */
  runPendingActions(): ExecutionRecord[] {
    const records: ExecutionRecord[] = [];
    for (;;) {
      this.controller.cleanController();
      const record = this.step();
      if (!record) return records;
      records.push(record);
    }
  }

  endFactionTurn(): OperationResult<FactionTurnResult> {
    // Nothing carries over into another faction's turn
    this.controller.resetActionManager();
    this.controller.cleanController();

    const advanced = this.turns.endTurn();
    if (!advanced.ok) return advanced;

    if (advanced.value.phase === 'resolving') {
      const resolved = this.turns.resolveCombat();
      this.resetScheduler();
      if (!resolved.ok) return resolved;
      const finished: FactionTurnResult = { ...advanced.value, phase: 'inactive', outcome: resolved.value };
      return succeed(finished);
    }

    this.restoreQueuesOf(advanced.value.currentFaction);
    return succeed(advanced.value);
  }

  /** Ends the current faction's turn only if none of its squads can do anything more. */
  endFactionTurnIfExhausted(): OperationResult<FactionTurnResult> | null {
    const current = this.turns.getCurrentFaction();
    if (current === NO_ENTITY || !this.turns.isFactionExhausted(current)) return null;
    return this.endFactionTurn();
  }

  // Immediate actions, bypassing the scheduler
  moveSquad(squadId: EntityId, target: GridPosition): OperationResult<SquadMoveResult> {
    const authorized = this.authorize(squadId);
    if (!authorized.ok) return authorized;
    return this.movement.moveSquad(squadId, target);
  }

  executeSquadAttack(attackerId: EntityId, defenderId: EntityId): OperationResult<SquadAttackResult> {
    const authorized = this.authorize(attackerId);
    if (!authorized.ok) return authorized;
    return this.resolveAttack(attackerId, defenderId);
  }

  getValidMovementTiles(squadId: EntityId): GridPosition[] {
    return this.movement.getValidMovementTiles(squadId);
  }

  getSquadsInRange(squadId: EntityId): EntityId[] {
    return this.actions.getSquadsInRange(squadId);
  }

  /** Abort: the turn machine goes inactive and every pending action is dropped. */
  endCombat(): OperationResult {
    const ended = this.turns.endCombat();
    this.resetScheduler();
    return ended;
  }

  getSquadQueue(squadId: EntityId): ActionQueue | undefined {
    return this.squadQueues.get(squadId);
  }

  getConfig(): CombatConfig {
    return this.config;
  }

  getWorld(): WorldImpl {
    return this.world;
  }

  getEventBus(): EventBusImpl {
    return this.eventBus;
  }

  getPositionSystem(): PositionSystem {
    return this.positions;
  }

  getActionController(): ActionController {
    return this.controller;
  }

  getTurnManager(): TurnManager {
    return this.turns;
  }

  getFactionManager(): FactionManager {
    return this.factions;
  }

  getMovementSystem(): CombatMovementSystem {
    return this.movement;
  }

  getActionSystem(): CombatActionSystem {
    return this.actions;
  }

  private authorize(squadId: EntityId): OperationResult {
    if (!this.turns.isCombatActive()) {
      return fail(new RuleViolationError('combat is not active', squadId));
    }
    const owner = CombatQueries.getFactionOwner(this.world, squadId);
    if (owner === NO_ENTITY) {
      return CombatQueries.getSquadMapPosition(this.world, squadId).ok
        ? fail(new RuleViolationError(`squad ${squadId} has no faction`, squadId))
        : fail(new RuleViolationError(`squad ${squadId} is not on the map`, squadId));
    }
    if (owner !== this.turns.getCurrentFaction()) {
      return fail(new RuleViolationError(`it is not faction ${owner}'s turn`, squadId));
    }
    const queue = this.squadQueues.get(squadId);
    if (queue && queue.totalActionPoints <= 0) {
      return fail(new RuleViolationError(`squad ${squadId} is out of action points`, squadId));
    }
    return succeed();
  }

  private submit(squadId: EntityId, action: Action, cost: number, kind: ActionKind): AddActionOutcome {
    let queue = this.squadQueues.get(squadId);
    if (!queue) {
      queue = new ActionQueue(squadId, this.config.squadActionPoints);
      this.squadQueues.set(squadId, queue);
    }

    const outcome = queue.addAction(action, cost, kind);
    this.controller.addActionQueue(queue);

    this.eventBus.emit({
      type: outcome === 'accepted' ? 'ActionQueued' : 'ActionDeduplicated',
      round: this.turns.getCurrentRound(),
      timestamp: Date.now(),
      entityId: squadId,
      data: { kind, cost },
    });
    return outcome;
  }

  private resolveAttack(attackerId: EntityId, defenderId: EntityId): OperationResult<SquadAttackResult> {
    const attacked = this.actions.executeAttack(attackerId, defenderId);
    if (attacked.ok && attacked.value.defenderDestroyed) {
      this.controller.removeActionQueueForEntity(defenderId);
      this.squadQueues.delete(defenderId);
    }
    return attacked;
  }

  // Action points come back at the start of the owning faction's turn
  private restoreQueuesOf(factionId: EntityId): void {
    for (const squadId of this.factions.getFactionSquads(factionId)) {
      this.squadQueues.get(squadId)?.resetActionPoints();
    }
  }

  private resetScheduler(): void {
    this.controller.clear();
    this.squadQueues = new Map();
  }

  private reportRejection(squadId: EntityId, kind: ActionKind, error: CombatError): void {
    this.eventBus.emit({
      type: 'ActionRejected',
      round: this.turns.getCurrentRound(),
      timestamp: Date.now(),
      entityId: squadId,
      data: { kind, error: error.name, message: error.message },
    });
  }
}
