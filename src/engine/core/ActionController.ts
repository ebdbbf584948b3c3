import type { EntityId } from '../types';
import type { EventBusImpl } from './EventBus';
import type { ActionQueue, ExecutionRecord } from './ActionQueue';

/** Stable reference to a registered queue. Goes stale once the queue is removed. */
export interface QueueHandle {
  readonly index: number;
  readonly generation: number;
}

export interface QueuePriority {
  ownerId: EntityId;
  totalActionPoints: number;
  pendingActions: number;
}

interface QueueSlot {
  generation: number;
  queue: ActionQueue | null;
  // Registration order; later registrations win ties
  sequence: number;
}

/**
 * Schedules every live ActionQueue of one combat. executeFirst() is the
 * single simulation step: it runs the head action of the queue with the most
 * action points. Ties go to the queue registered most recently.
 */
export class ActionController {
  private slots: QueueSlot[] = [];
  private freeSlots: number[] = [];
  private handles: Map<ActionQueue, QueueHandle> = new Map();
  private order: QueueHandle[] = [];
  private nextSequence = 0;

  constructor(private readonly eventBus?: EventBusImpl) {}

  addActionQueue(queue: ActionQueue): QueueHandle {
    const existing = this.handles.get(queue);
    if (existing) {
      this.reorderActions();
      return existing;
    }

    const handle = this.allocateSlot(queue);
    this.handles.set(queue, handle);
    this.order.push(handle);
    this.reorderActions();
    return handle;
  }

  getQueue(handle: QueueHandle): ActionQueue | undefined {
    const slot = this.slots[handle.index];
    if (!slot || slot.generation !== handle.generation) return undefined;
    return slot.queue ?? undefined;
  }

  getHandle(queue: ActionQueue): QueueHandle | undefined {
    return this.handles.get(queue);
  }

  hasActionQueue(queue: ActionQueue): boolean {
    return this.handles.has(queue);
  }

  findQueueForEntity(ownerId: EntityId): ActionQueue | undefined {
    return this.getQueues().find((queue) => queue.ownerId === ownerId);
  }

  /**
   * Drop every queue with nothing pending, keeping the order of the rest.
   * Only call this where no caller is about to submit into an emptied queue
   * during the same step. CombatService does it at faction-turn boundaries
   * and between the steps it drives itself.
   */
  cleanController(): number {
    const remaining: QueueHandle[] = [];
    let removed = 0;
    for (const handle of this.order) {
      const queue = this.getQueue(handle);
      if (queue && queue.numOfActions() > 0) {
        remaining.push(handle);
      } else {
        this.releaseSlot(handle);
        removed++;
      }
    }
    this.order = remaining;
    return removed;
  }

  executeFirst(): ExecutionRecord | null {
    const first = this.order[0];
    if (!first) return null;

    const queue = this.getQueue(first);
    const record = queue?.executeAction() ?? null;
    this.reorderActions();

    if (record) {
      this.reportExecution(record);
    }
    return record;
  }

  removeActionQueueForEntity(ownerId: EntityId): boolean {
    const handle = this.order.find((h) => this.getQueue(h)?.ownerId === ownerId);
    if (!handle) return false;

    this.order = this.order.filter((h) => h !== handle);
    this.releaseSlot(handle);
    return true;
  }

  /** Restore every queue's starting action points. */
  resetActionPoints(): void {
    for (const queue of this.getQueues()) {
      queue.resetActionPoints();
    }
    this.reorderActions();
  }

  /** Discard every pending entry; the queues stay registered. */
  resetActionManager(): void {
    for (const queue of this.getQueues()) {
      queue.resetQueue();
    }
  }

  // Teardown at combat end. Outstanding handles all go stale.
  clear(): void {
    for (const handle of this.order) {
      this.releaseSlot(handle);
    }
    this.order = [];
  }

  size(): number {
    return this.order.length;
  }

  getQueues(): ActionQueue[] {
    const queues: ActionQueue[] = [];
    for (const handle of this.order) {
      const queue = this.getQueue(handle);
      if (queue) queues.push(queue);
    }
    return queues;
  }

  getPriorityOrder(): QueuePriority[] {
    return this.getQueues().map((queue) => ({
      ownerId: queue.ownerId,
      totalActionPoints: queue.totalActionPoints,
      pendingActions: queue.numOfActions(),
    }));
  }

  // Points descending; on equal points the later registration goes first
  private reorderActions(): void {
    const points = (handle: QueueHandle) => this.getQueue(handle)?.totalActionPoints ?? 0;
    const sequence = (handle: QueueHandle) => this.slots[handle.index]?.sequence ?? 0;

    this.order.sort((a, b) => {
      const byPoints = points(b) - points(a);
      if (byPoints !== 0) return byPoints;
      return sequence(b) - sequence(a);
    });
  }

  private allocateSlot(queue: ActionQueue): QueueHandle {
    const sequence = this.nextSequence++;
    const reused = this.freeSlots.pop();
    if (reused !== undefined) {
      const slot = this.slots[reused];
      slot.queue = queue;
      slot.sequence = sequence;
      return { index: reused, generation: slot.generation };
    }

    this.slots.push({ generation: 0, queue, sequence });
    return { index: this.slots.length - 1, generation: 0 };
  }

  private releaseSlot(handle: QueueHandle): void {
    const slot = this.slots[handle.index];
    if (!slot || slot.generation !== handle.generation) return;

    if (slot.queue) {
      this.handles.delete(slot.queue);
    }
    slot.queue = null;
    slot.generation++;
    this.freeSlots.push(handle.index);
  }

  private reportExecution(record: ExecutionRecord): void {
    if (!this.eventBus) return;

    this.eventBus.emit({
      type: record.executed ? 'ActionExecuted' : 'ActionSkipped',
      timestamp: Date.now(),
      entityId: record.ownerId,
      data: {
        kind: record.kind,
        cost: record.cost,
        actionPointsAfter: record.actionPointsAfter,
        ...(record.executed ? {} : { reason: 'action has no behavior' }),
      },
    });
  }
}
