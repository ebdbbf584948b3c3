import type { EntityId } from '../types';
import { type Action, type ActionKind, executeAction } from '../actions';
import { InvalidActionCostError } from './errors';

export interface ActionQueueEntry {
  readonly action: Action;
  readonly cost: number;
  readonly kind: ActionKind;
}

export type AddActionOutcome = 'accepted' | 'deduplicated';

export interface ExecutionRecord {
  ownerId: EntityId;
  kind: ActionKind;
  cost: number;
  /** False when the action had no behaviour to run; its cost is still paid. */
  executed: boolean;
  actionPointsAfter: number;
}

/**
 * Pending actions of one actor plus its action-point ledger.
 * Points may go negative: an actor can act into debt and then waits
 * for regeneration, which happens outside this class.
 */
export class ActionQueue {
  readonly ownerId: EntityId;
  private readonly startingActionPoints: number;
  private actionPoints: number;
  private entries: ActionQueueEntry[] = [];

  constructor(ownerId: EntityId, totalActionPoints: number) {
    this.ownerId = ownerId;
    this.startingActionPoints = totalActionPoints;
    this.actionPoints = totalActionPoints;
  }

  get totalActionPoints(): number {
    return this.actionPoints;
  }

  /**
   * At most one entry per kind. A repeated kind is dropped, not replaced.
   * Throws InvalidActionCostError when cost <= 0.
   */
  addAction(action: Action, cost: number, kind: ActionKind): AddActionOutcome {
    if (!(cost > 0)) {
      throw new InvalidActionCostError(cost);
    }
    if (this.hasActionOfKind(kind)) {
      return 'deduplicated';
    }
    this.entries.push({ action, cost, kind });
    return 'accepted';
  }

  executeAction(): ExecutionRecord | null {
    const head = this.entries[0];
    if (!head) return null;

    this.actionPoints -= head.cost;
    const executed = executeAction(head.action);
    this.pop();

    return {
      ownerId: this.ownerId,
      kind: head.kind,
      cost: head.cost,
      executed,
      actionPointsAfter: this.actionPoints,
    };
  }

  pop(): void {
    if (this.entries.length > 0) {
      this.entries.shift();
    }
  }

  peek(): ActionQueueEntry | undefined {
    return this.entries[0];
  }

  numOfActions(): number {
    return this.entries.length;
  }

  hasActionOfKind(kind: ActionKind): boolean {
    return this.entries.some((entry) => entry.kind === kind);
  }

  getEntries(): readonly ActionQueueEntry[] {
    return [...this.entries];
  }

  resetQueue(): void {
    this.entries = [];
  }

  resetActionPoints(): void {
    this.actionPoints = this.startingActionPoints;
  }
}
