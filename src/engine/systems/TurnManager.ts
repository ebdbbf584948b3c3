import type { WorldImpl } from '../ecs/World';
import type { EventBusImpl } from '../core/EventBus';
import { type EntityId, type GameEventType, NO_ENTITY } from '../types';
import type { ActionStateComponent, CombatPhase, TurnStateComponent } from '../components';
import { type RandomSource, shuffle } from '../core/SeededRandom';
import { type OperationResult, NotFoundError, RuleViolationError, fail, succeed } from '../core/errors';
import { CombatQueries } from './CombatQueries';

export interface TurnManagerOptions {
  random: RandomSource;
  getMovementSpeed: (squadId: EntityId) => number;
  /** Destroyed squads no longer count towards a faction still being in the fight. */
  isSquadDestroyed?: (squadId: EntityId) => boolean;
}

export interface TurnAdvanceResult {
  phase: CombatPhase;
  round: number;
  currentFaction: EntityId;
  roundEnded: boolean;
}

export interface CombatOutcome {
  rounds: number;
  survivingFactions: EntityId[];
  /** NO_ENTITY when nobody or more than one faction is left. */
  winner: EntityId;
}

/**
 * Faction-level turn state machine: inactive -> active -> resolving -> inactive.
 * Turn order is shuffled once when combat starts. Also the only writer of
 * ActionState records.
 */
export class TurnManager {
  constructor(
    private readonly world: WorldImpl,
    private readonly eventBus: EventBusImpl,
    private readonly options: TurnManagerOptions
  ) {}

  initializeCombat(factionIds: EntityId[]): OperationResult {
    if (this.isCombatActive()) {
      return fail(new RuleViolationError('combat already active'));
    }
    if (factionIds.length === 0) {
      return fail(new RuleViolationError('combat needs at least one faction'));
    }

    // One turn state per combat; drop the one left by a finished combat
    const previous = CombatQueries.findTurnStateEntity(this.world);
    if (previous !== undefined) {
      this.world.removeEntity(previous);
    }

    const turnOrder = shuffle(factionIds, this.options.random);
    const turnEntity = this.world.createEntity();
    this.world.addComponent<TurnStateComponent>(turnEntity, {
      type: 'turnState',
      combatActive: true,
      phase: 'active',
      currentRound: 1,
      turnOrder,
      currentTurnIndex: 0,
    });

    for (const factionId of factionIds) {
      for (const squadId of CombatQueries.getSquadsForFaction(this.world, factionId)) {
        this.createActionStateForSquad(squadId);
      }
    }

    this.emit('CombatStarted', 1, undefined, { turnOrder: [...turnOrder] });
    this.emit('RoundStarted', 1, undefined, {});
    this.startFactionTurn(turnOrder[0], 1);

    return succeed();
  }

  /** Returns the existing record's entity when the squad already has one. */
  createActionStateForSquad(squadId: EntityId): EntityId {
    const existing = CombatQueries.findActionStateEntity(this.world, squadId);
    if (existing !== undefined) return existing;

    const entity = this.world.createEntity();
    this.world.addComponent<ActionStateComponent>(entity, {
      type: 'actionState',
      squadId,
      hasMoved: false,
      hasActed: false,
      movementRemaining: 0, // Set by resetSquadActions
    });
    return entity;
  }

  resetSquadActions(factionId: EntityId): void {
    for (const squadId of CombatQueries.getSquadsForFaction(this.world, factionId)) {
      const entity = this.createActionStateForSquad(squadId);
      const actionState = this.world.getComponent<ActionStateComponent>(entity, 'actionState');
      if (!actionState) continue;

      this.world.addComponent<ActionStateComponent>(entity, {
        ...actionState,
        hasMoved: false,
        hasActed: false,
        movementRemaining: Math.max(0, this.options.getMovementSpeed(squadId)),
      });
    }
  }

  getPhase(): CombatPhase {
    return CombatQueries.findTurnState(this.world)?.phase ?? 'inactive';
  }

  isCombatActive(): boolean {
    return CombatQueries.findTurnState(this.world)?.combatActive ?? false;
  }

  /** NO_ENTITY outside an active combat. */
  getCurrentFaction(): EntityId {
    const turnState = CombatQueries.findTurnState(this.world);
    if (!turnState || turnState.phase !== 'active') return NO_ENTITY;

    const index = turnState.currentTurnIndex;
    if (index < 0 || index >= turnState.turnOrder.length) return NO_ENTITY;
    return turnState.turnOrder[index];
  }

  getCurrentRound(): number {
    return CombatQueries.getCurrentRound(this.world);
  }

  getTurnOrder(): EntityId[] {
    return [...(CombatQueries.findTurnState(this.world)?.turnOrder ?? [])];
  }

  /**
   * Hand control to the next faction. After the last faction the round either
   * loops or, when at most one faction still has squads, combat moves to
   * 'resolving' and waits for resolveCombat().
   */
  endTurn(): OperationResult<TurnAdvanceResult> {
    const turnEntity = CombatQueries.findTurnStateEntity(this.world);
    const turnState =
      turnEntity === undefined ? undefined : this.world.getComponent<TurnStateComponent>(turnEntity, 'turnState');
    if (turnEntity === undefined || !turnState || turnState.phase !== 'active') {
      return fail(new RuleViolationError('no active combat'));
    }

    const endingFaction = turnState.turnOrder[turnState.currentTurnIndex];
    this.emit('FactionTurnEnded', turnState.currentRound, endingFaction, {});

    let nextIndex = turnState.currentTurnIndex + 1;
    let round = turnState.currentRound;
    const roundEnded = nextIndex >= turnState.turnOrder.length;

    if (roundEnded) {
      if (this.shouldTerminate(turnState.turnOrder)) {
        this.world.addComponent<TurnStateComponent>(turnEntity, { ...turnState, phase: 'resolving' });
        this.emit('CombatResolving', round, undefined, {
          survivingFactions: this.getSurvivingFactions(turnState.turnOrder),
        });
        return succeed({ phase: 'resolving', round, currentFaction: NO_ENTITY, roundEnded });
      }
      nextIndex = 0;
      round++;
    }

    this.world.addComponent<TurnStateComponent>(turnEntity, {
      ...turnState,
      currentTurnIndex: nextIndex,
      currentRound: round,
    });

    if (roundEnded) {
      this.emit('RoundStarted', round, undefined, {});
    }
    const nextFaction = turnState.turnOrder[nextIndex];
    this.startFactionTurn(nextFaction, round);

    return succeed({ phase: 'active', round, currentFaction: nextFaction, roundEnded });
  }

  /** resolving -> inactive, reporting who is left standing. */
  resolveCombat(): OperationResult<CombatOutcome> {
    const turnEntity = CombatQueries.findTurnStateEntity(this.world);
    const turnState =
      turnEntity === undefined ? undefined : this.world.getComponent<TurnStateComponent>(turnEntity, 'turnState');
    if (turnEntity === undefined || !turnState || turnState.phase !== 'resolving') {
      return fail(new RuleViolationError('combat is not resolving'));
    }

    const survivingFactions = this.getSurvivingFactions(turnState.turnOrder);
    const outcome: CombatOutcome = {
      rounds: turnState.currentRound,
      survivingFactions,
      winner: survivingFactions.length === 1 ? survivingFactions[0] : NO_ENTITY,
    };

    this.world.addComponent<TurnStateComponent>(turnEntity, {
      ...turnState,
      combatActive: false,
      phase: 'inactive',
    });
    this.emit('CombatEnded', turnState.currentRound, undefined, {
      reason: 'resolved',
      winner: outcome.winner,
      survivingFactions: [...survivingFactions],
    });

    return succeed(outcome);
  }

  /** Abort from any live phase. */
  endCombat(): OperationResult {
    const turnEntity = CombatQueries.findTurnStateEntity(this.world);
    const turnState =
      turnEntity === undefined ? undefined : this.world.getComponent<TurnStateComponent>(turnEntity, 'turnState');
    if (turnEntity === undefined || !turnState || turnState.phase === 'inactive') {
      return fail(new RuleViolationError('no active combat to end'));
    }

    this.world.addComponent<TurnStateComponent>(turnEntity, {
      ...turnState,
      combatActive: false,
      phase: 'inactive',
    });
    this.emit('CombatEnded', turnState.currentRound, undefined, { reason: 'ended' });
    return succeed();
  }

  /** The squad belongs to the faction whose turn it is and still has something to spend. */
  isSquadActivatable(squadId: EntityId): boolean {
    const currentFaction = this.getCurrentFaction();
    if (currentFaction === NO_ENTITY) return false;
    if (CombatQueries.getFactionOwner(this.world, squadId) !== currentFaction) return false;
    return !this.isSquadExhausted(squadId);
  }

  isSquadExhausted(squadId: EntityId): boolean {
    const actionState = CombatQueries.findActionState(this.world, squadId);
    if (!actionState) return true;
    return actionState.hasActed && actionState.movementRemaining === 0;
  }

  // No squads left counts as exhausted
  isFactionExhausted(factionId: EntityId): boolean {
    return this.getActiveSquads(factionId).every((squadId) => this.isSquadExhausted(squadId));
  }

  /** Ends the current faction's turn once all its squads are spent; null otherwise. */
  advanceIfFactionExhausted(): OperationResult<TurnAdvanceResult> | null {
    const currentFaction = this.getCurrentFaction();
    if (currentFaction === NO_ENTITY) return null;
    if (!this.isFactionExhausted(currentFaction)) return null;
    return this.endTurn();
  }

  canSquadAct(squadId: EntityId): boolean {
    const actionState = CombatQueries.findActionState(this.world, squadId);
    return actionState ? !actionState.hasActed : false;
  }

  canSquadMove(squadId: EntityId): boolean {
    const actionState = CombatQueries.findActionState(this.world, squadId);
    return actionState ? actionState.movementRemaining > 0 : false;
  }

  markSquadAsActed(squadId: EntityId): OperationResult {
    return this.updateActionState(squadId, () => ({ hasActed: true }));
  }

  markSquadAsMoved(squadId: EntityId): OperationResult {
    return this.updateActionState(squadId, () => ({ hasMoved: true }));
  }

  /** Floors at zero whatever the amount. */
  decrementMovementRemaining(squadId: EntityId, amount: number): OperationResult {
    return this.updateActionState(squadId, (state) => ({
      movementRemaining: Math.max(0, state.movementRemaining - amount),
    }));
  }

  private updateActionState(
    squadId: EntityId,
    update: (state: ActionStateComponent) => Partial<Omit<ActionStateComponent, 'type' | 'squadId'>>
  ): OperationResult {
    const entity = CombatQueries.findActionStateEntity(this.world, squadId);
    const actionState =
      entity === undefined ? undefined : this.world.getComponent<ActionStateComponent>(entity, 'actionState');
    if (entity === undefined || !actionState) {
      return fail(new NotFoundError(`no action state for squad ${squadId}`, { entityId: squadId }));
    }

    this.world.addComponent<ActionStateComponent>(entity, { ...actionState, ...update(actionState) });
    return succeed();
  }

  private getActiveSquads(factionId: EntityId): EntityId[] {
    const isDestroyed = this.options.isSquadDestroyed;
    const squads = CombatQueries.getSquadsForFaction(this.world, factionId);
    return isDestroyed ? squads.filter((squadId) => !isDestroyed(squadId)) : squads;
  }

  private getSurvivingFactions(turnOrder: EntityId[]): EntityId[] {
    return turnOrder.filter((factionId) => this.getActiveSquads(factionId).length > 0);
  }

  private shouldTerminate(turnOrder: EntityId[]): boolean {
    return this.getSurvivingFactions(turnOrder).length <= 1;
  }

  private startFactionTurn(factionId: EntityId, round: number): void {
    this.resetSquadActions(factionId);
    this.emit('FactionTurnStarted', round, factionId, {
      squads: CombatQueries.getSquadsForFaction(this.world, factionId),
    });
  }

  private emit(type: GameEventType, round: number, entityId: EntityId | undefined, data: Record<string, unknown>): void {
    this.eventBus.emit({ type, round, timestamp: Date.now(), entityId, data });
  }
}
