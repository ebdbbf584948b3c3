import type { Component, EntityId, GridPosition } from '../types';

// Faction (a side in combat). factionId mirrors the owning entity's id.
export interface FactionComponent extends Component {
  type: 'faction';
  factionId: EntityId;
  name: string;
  isPlayerControlled: boolean;
}

// Marks an entity as a squad (the unit of command on the combat grid)
export interface SquadComponent extends Component {
  type: 'squad';
  name: string;
}

export type CombatPhase = 'inactive' | 'active' | 'resolving';

// One per combat
export interface TurnStateComponent extends Component {
  type: 'turnState';
  combatActive: boolean;
  phase: CombatPhase;
  currentRound: number;
  turnOrder: EntityId[];
  currentTurnIndex: number;
}

// Where a squad stands and who owns it; keyed 1:1 by squadId
export interface MapPositionComponent extends Component {
  type: 'mapPosition';
  squadId: EntityId;
  factionId: EntityId;
  position: GridPosition;
}

// Per-squad budget for the current faction turn; keyed 1:1 by squadId
export interface ActionStateComponent extends Component {
  type: 'actionState';
  squadId: EntityId;
  hasActed: boolean;
  hasMoved: boolean;
  movementRemaining: number;
}
