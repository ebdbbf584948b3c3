import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import { CombatService } from '../../../src/engine/core/CombatService';
import type { RandomSource } from '../../../src/engine/core/SeededRandom';
import { RuleViolationError } from '../../../src/engine/core/errors';
import type { CombatConfigInput } from '../../../src/engine/data/CombatConfig';
import { NO_ENTITY, type EntityId } from '../../../src/engine/types';
import { FakeSquadProvider } from '../FakeSquadProvider';

const keepOrder: RandomSource = { nextInt: (bound) => bound - 1 };

describe('CombatService', () => {
  let provider: FakeSquadProvider;
  let service: CombatService;
  let red: EntityId;
  let blue: EntityId;
  let redSquad: EntityId;
  let blueSquad: EntityId;

  const createService = (config: CombatConfigInput = { seed: 1 }): CombatService => {
    const created = new CombatService({ config, provider, random: keepOrder });
    red = created.createFaction('Red', true);
    blue = created.createFaction('Blue', false);
    redSquad = created.createSquad('Red One');
    blueSquad = created.createSquad('Blue One');
    created.addSquadToFaction(red, redSquad, { x: 0, y: 0 });
    created.addSquadToFaction(blue, blueSquad, { x: 1, y: 1 });
    return created;
  };

  beforeEach(() => {
    provider = new FakeSquadProvider();
    service = createService();
  });

  describe('setup', () => {
    it('rejects an invalid configuration', () => {
      expect(() => new CombatService({ config: { seed: 1, attackCost: -2 }, provider })).toThrow(ZodError);
    });

    it('starts combat with every faction by default', () => {
      expect(service.startCombat().ok).toBe(true);
      expect(service.getTurnManager().getTurnOrder()).toEqual([red, blue]);
      expect(service.getTurnManager().getCurrentFaction()).toBe(red);
    });

    it('derives the turn order from the configured seed', () => {
      const orders = [1, 2].map(() => {
        const seeded = new CombatService({ config: { seed: 1234 }, provider });
        const ids = [seeded.createFaction('A', true), seeded.createFaction('B', false), seeded.createFaction('C', false)];
        seeded.startCombat(ids);
        return seeded.getTurnManager().getTurnOrder();
      });
      expect(orders[0]).toEqual(orders[1]);
    });
  });

  describe('queueSquadMove', () => {
    beforeEach(() => {
      service.startCombat();
    });

    it('queues a move priced by distance and runs it on the next step', () => {
      expect(service.queueSquadMove(redSquad, { x: 2, y: 0 })).toEqual({ ok: true, value: 'accepted' });
      expect(service.getPositionSystem().getEntityIDAt({ x: 0, y: 0 })).toBe(redSquad);

      const record = service.step();

      expect(record).toEqual({ ownerId: redSquad, kind: 'movement', cost: 2, executed: true, actionPointsAfter: 8 });
      expect(service.getPositionSystem().getEntityIDAt({ x: 2, y: 0 })).toBe(redSquad);
      expect(service.getEventBus().getHistoryOfType('ActionQueued')[0].data).toEqual({ kind: 'movement', cost: 2 });
    });

    it('keeps only the first move per squad', () => {
      service.queueSquadMove(redSquad, { x: 1, y: 0 });
      expect(service.queueSquadMove(redSquad, { x: 0, y: 1 })).toEqual({ ok: true, value: 'deduplicated' });

      service.runPendingActions();

      expect(service.getPositionSystem().getEntityIDAt({ x: 1, y: 0 })).toBe(redSquad);
      expect(service.getEventBus().getHistoryOfType('ActionDeduplicated')).toHaveLength(1);
    });

    it('rejects a move onto the squad\'s own tile', () => {
      const result = service.queueSquadMove(redSquad, { x: 0, y: 0 });
      expect(result.ok).toBe(false);
      expect(service.getSquadQueue(redSquad)).toBeUndefined();
    });

    it('rejects squads whose faction is not taking its turn', () => {
      const result = service.queueSquadMove(blueSquad, { x: 2, y: 2 });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(RuleViolationError);
        expect(result.error.message).toBe(`it is not faction ${blue}'s turn`);
      }
    });

    it('refuses a move beyond the remaining movement when it is queued', () => {
      const result = service.queueSquadMove(redSquad, { x: 5, y: 0 });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(RuleViolationError);
        expect(result.error.message).toBe('insufficient movement: need 5, have 3');
      }
      expect(service.getSquadQueue(redSquad)).toBeUndefined();
      expect(service.step()).toBeNull();
    });

    it('refuses a move onto an enemy when it is queued', () => {
      const result = service.queueSquadMove(redSquad, { x: 1, y: 1 });

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('cannot move to (1, 1)');
      expect(service.getEventBus().getHistoryOfType('ActionQueued')).toHaveLength(0);
    });

    it('reports a move that became invalid before it ran', () => {
      service.queueSquadMove(redSquad, { x: 2, y: 0 });
      service.getFactionManager().relocateSquad(blueSquad, { x: 2, y: 0 });

      const record = service.step();

      expect(record?.executed).toBe(true);
      expect(service.getPositionSystem().getEntityIDAt({ x: 0, y: 0 })).toBe(redSquad);
      const [rejected] = service.getEventBus().getHistoryOfType('ActionRejected');
      expect(rejected.entityId).toBe(redSquad);
      expect(rejected.data).toEqual({
        kind: 'movement',
        error: 'RuleViolationError',
        message: 'cannot move to (2, 0)',
      });
    });

    it('stops accepting actions once a squad is in debt', () => {
      service = createService({ seed: 1, squadActionPoints: 2 });
      service.startCombat();
      service.queueSquadMove(redSquad, { x: 3, y: 0 });
      service.runPendingActions();
      expect(service.getSquadQueue(redSquad)?.totalActionPoints).toBe(-1);

      const result = service.queueSquadAttack(redSquad, blueSquad);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe(`squad ${redSquad} is out of action points`);
    });
  });

  describe('queued moves with a faster squad', () => {
    beforeEach(() => {
      provider.speeds.set(redSquad, 6);
      service.startCombat();
    });

    it('ends on the requested tile after moving in between', () => {
      service.queueSquadMove(redSquad, { x: 3, y: 0 });
      service.moveSquad(redSquad, { x: 1, y: 0 });

      service.step();

      expect(service.getPositionSystem().getEntityIDAt({ x: 3, y: 0 })).toBe(redSquad);
      expect(service.getPositionSystem().hasEntityAt({ x: 4, y: 0 })).toBe(false);
      const moves = service.getEventBus().getHistoryOfType('SquadMoved');
      expect(moves[moves.length - 1].data).toEqual({
        from: { x: 1, y: 0 },
        to: { x: 3, y: 0 },
        movementCost: 2,
        movementRemaining: 3,
      });
    });
  });

  it('refuses actions outside combat', () => {
    const result = service.queueSquadMove(redSquad, { x: 1, y: 0 });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('combat is not active');
  });

  describe('scheduling', () => {
    beforeEach(() => {
      service.startCombat();
    });

    it('runs queues by action points with the later queue first on ties', () => {
      const redTwo = service.createSquad('Red Two');
      service.addSquadToFaction(red, redTwo, { x: 0, y: 3 });
      service.endFactionTurn();
      service.endFactionTurn();

      service.queueSquadMove(redSquad, { x: 1, y: 0 });
      service.queueSquadMove(redTwo, { x: 1, y: 3 });

      expect(service.runPendingActions().map((record) => record.ownerId)).toEqual([redTwo, redSquad]);
    });

    it('spends points before the next squad gets a turn', () => {
      const redTwo = service.createSquad('Red Two');
      service.addSquadToFaction(red, redTwo, { x: 0, y: 3 });
      service.endFactionTurn();
      service.endFactionTurn();

      service.queueSquadMove(redSquad, { x: 1, y: 0 });
      service.queueSquadAttack(redSquad, blueSquad);
      service.queueSquadMove(redTwo, { x: 2, y: 3 });

      // redTwo 10 -> 8, then redSquad 10 -> 9 -> 7
      expect(service.runPendingActions().map((record) => [record.ownerId, record.kind])).toEqual([
        [redTwo, 'movement'],
        [redSquad, 'movement'],
        [redSquad, 'attack'],
      ]);
    });

    it('runs caller-defined actions with their arguments', () => {
      const behavior = vi.fn();
      service.queueSquadAction(redSquad, 'pickupItem', 1, [{ x: 0, y: 0 }, 12], behavior);

      service.step();

      expect(behavior).toHaveBeenCalledWith(expect.anything(), redSquad, [{ x: 0, y: 0 }, 12]);
    });

    it('charges and logs an action without behaviour', () => {
      service.queueSquadAction(redSquad, 'pickupItem', 1, [], null);

      expect(service.step()).toEqual({
        ownerId: redSquad,
        kind: 'pickupItem',
        cost: 1,
        executed: false,
        actionPointsAfter: 9,
      });
      expect(service.getEventBus().getHistoryOfType('ActionSkipped')).toHaveLength(1);
    });

    it('drops emptied queues between steps', () => {
      service.queueSquadMove(redSquad, { x: 1, y: 0 });
      service.runPendingActions();

      expect(service.getActionController().size()).toBe(0);
      expect(service.step()).toBeNull();
    });
  });

  describe('attacks', () => {
    beforeEach(() => {
      service.startCombat();
    });

    it('resolves a queued attack', () => {
      expect(service.queueSquadAttack(redSquad, blueSquad)).toEqual({ ok: true, value: 'accepted' });

      const [record] = service.runPendingActions();

      expect(record).toEqual({ ownerId: redSquad, kind: 'attack', cost: 2, executed: true, actionPointsAfter: 8 });
      expect(provider.attacks).toEqual([[redSquad, blueSquad]]);
    });

    it('refuses a second attack in the same turn', () => {
      service.executeSquadAttack(redSquad, blueSquad);

      const result = service.queueSquadAttack(redSquad, blueSquad);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('squad has already acted this turn');
    });

    it('drops the queue of a destroyed squad', () => {
      service.endFactionTurn();
      service.queueSquadMove(blueSquad, { x: 1, y: 0 });
      service.runPendingActions();
      service.endFactionTurn();
      expect(service.getSquadQueue(blueSquad)).toBeDefined();

      provider.lethal.add(blueSquad);
      expect(service.executeSquadAttack(redSquad, blueSquad)).toMatchObject({
        ok: true,
        value: { defenderDestroyed: true },
      });

      expect(service.getSquadQueue(blueSquad)).toBeUndefined();
      expect(service.getPositionSystem().hasEntityAt({ x: 1, y: 0 })).toBe(false);
    });
  });

  describe('endFactionTurn', () => {
    beforeEach(() => {
      service.startCombat();
    });

    it('discards actions that did not run', () => {
      service.queueSquadMove(redSquad, { x: 1, y: 0 });

      const result = service.endFactionTurn();

      expect(result).toMatchObject({ ok: true, value: { phase: 'active', currentFaction: blue } });
      expect(service.getActionController().size()).toBe(0);
      expect(service.getPositionSystem().getEntityIDAt({ x: 0, y: 0 })).toBe(redSquad);
    });

    it('restores action points when the faction comes round again', () => {
      service.queueSquadMove(redSquad, { x: 2, y: 0 });
      service.runPendingActions();

      service.endFactionTurn();
      service.endFactionTurn();

      expect(service.getTurnManager().getCurrentRound()).toBe(2);
      expect(service.getSquadQueue(redSquad)?.totalActionPoints).toBe(10);
    });

    it('resolves combat once a single faction is left', () => {
      provider.lethal.add(blueSquad);
      service.queueSquadAttack(redSquad, blueSquad);
      service.runPendingActions();

      service.endFactionTurn();
      const result = service.endFactionTurn();

      expect(result).toEqual({
        ok: true,
        value: {
          phase: 'inactive',
          round: 1,
          currentFaction: NO_ENTITY,
          roundEnded: true,
          outcome: { rounds: 1, survivingFactions: [red], winner: red },
        },
      });
      expect(service.getTurnManager().isCombatActive()).toBe(false);
      expect(service.getSquadQueue(redSquad)).toBeUndefined();
    });

    it('ends an exhausted faction\'s turn on request', () => {
      expect(service.endFactionTurnIfExhausted()).toBeNull();

      service.executeSquadAttack(redSquad, blueSquad);
      service.moveSquad(redSquad, { x: 0, y: 3 });

      expect(service.endFactionTurnIfExhausted()).toMatchObject({ ok: true, value: { currentFaction: blue } });
    });
  });

  describe('immediate actions', () => {
    beforeEach(() => {
      service.startCombat();
    });

    it('moves a squad of the current faction right away', () => {
      expect(service.moveSquad(redSquad, { x: 0, y: 2 }).ok).toBe(true);

      // One tile left to spend; the enemy on (1, 1) blocks one neighbour
      const tiles = service.getValidMovementTiles(redSquad);
      expect(tiles).toHaveLength(7);
      expect(tiles).not.toContainEqual({ x: 1, y: 1 });
    });

    it('refuses squads of other factions', () => {
      expect(service.moveSquad(blueSquad, { x: 2, y: 2 }).ok).toBe(false);
      expect(service.executeSquadAttack(blueSquad, redSquad).ok).toBe(false);
    });

    it('lists attackable enemies', () => {
      expect(service.getSquadsInRange(redSquad)).toEqual([blueSquad]);
    });
  });

  it('endCombat drops everything pending', () => {
    service.startCombat();
    service.queueSquadMove(redSquad, { x: 1, y: 0 });

    expect(service.endCombat().ok).toBe(true);

    expect(service.getActionController().size()).toBe(0);
    expect(service.getTurnManager().getPhase()).toBe('inactive');
    expect(service.step()).toBeNull();
  });
});
