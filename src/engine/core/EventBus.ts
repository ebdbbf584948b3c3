import type { GameEvent, GameEventType } from '../types';

export type GameEventListener = (event: GameEvent) => void;

export interface EventBus {
  subscribe(type: GameEventType, callback: GameEventListener): () => void;
  subscribeAll(callback: GameEventListener): () => void;
  emit(event: GameEvent): void;
  getHistory(): GameEvent[];
  getHistoryOfType(type: GameEventType): GameEvent[];
  clearHistory(): void;
}

export class EventBusImpl implements EventBus {
  private listeners: Map<GameEventType, Set<GameEventListener>> = new Map();
  private allListeners: Set<GameEventListener> = new Set();
  private history: GameEvent[] = [];

  subscribe(type: GameEventType, callback: GameEventListener): () => void {
    let typeListeners = this.listeners.get(type);
    if (!typeListeners) {
      typeListeners = new Set();
      this.listeners.set(type, typeListeners);
    }
    typeListeners.add(callback);

    return () => {
      this.listeners.get(type)?.delete(callback);
    };
  }

  subscribeAll(callback: GameEventListener): () => void {
    this.allListeners.add(callback);
    return () => {
      this.allListeners.delete(callback);
    };
  }

  emit(event: GameEvent): void {
    this.history.push(event);

    // Notify type-specific listeners
    const typeListeners = this.listeners.get(event.type);
    if (typeListeners) {
      for (const callback of typeListeners) {
        callback(event);
      }
    }

    // Notify all-event listeners
    for (const callback of this.allListeners) {
      callback(event);
    }
  }

  getHistory(): GameEvent[] {
    return [...this.history];
  }

  getHistoryOfType(type: GameEventType): GameEvent[] {
    return this.history.filter((event) => event.type === type);
  }

  clearHistory(): void {
    this.history = [];
  }
}
