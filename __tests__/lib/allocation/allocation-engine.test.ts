import { AllocationEngine, orderPairingsForAllocation, sortTables } from '@/lib/allocation/allocation-engine';
import {
  BYE_REASON,
  COST_TABLE_REUSE,
  CONFLICT_TYPES,
  SUMMARY_OPTIMAL,
  SUMMARY_ROUND1_CLEAN,
} from '@/lib/constants';
import { InsufficientTablesError, InvariantViolationError, ValidationError } from '@/lib/error-handling';
import type { Pairing } from '@/lib/allocation/types';
import {
  competitor,
  fixedClock,
  flatCostModel,
  pairing,
  staticHistory,
  table,
  tables,
} from '../../helpers/allocation-fixtures';

describe('orderPairingsForAllocation', () => {
  it('should order by combined score, then smallest competitor id', () => {
    const p1 = pairing(competitor('c', 3), competitor('d', 3));
    const p2 = pairing(competitor('b', 5), competitor('e', 1));
    const p3 = pairing(competitor('a', 0), competitor('f', null));
    const p4 = pairing(competitor('g', 6), competitor('h', 0));

    expect(orderPairingsForAllocation([p1, p2, p3, p4])).toEqual([p2, p1, p4, p3]);
  });

  it('should compare competitor ids as strings', () => {
    const nine = pairing(competitor('9'), competitor('z'));
    const ten = pairing(competitor('10'), competitor('y'));

    expect(orderPairingsForAllocation([nine, ten])).toEqual([ten, nine]);
  });

  it('should keep input order for full ties', () => {
    const first = pairing(competitor('x', 2), competitor('y', 2));
    const second = pairing(competitor('x', 2), competitor('z', 2));

    expect(orderPairingsForAllocation([first, second])).toEqual([first, second]);
    expect(orderPairingsForAllocation([second, first])).toEqual([second, first]);
  });
});

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items];
  return items.flatMap((item, index) =>
    permutations([...items.slice(0, index), ...items.slice(index + 1)]).map((rest) => [item, ...rest])
  );
}

describe('orderPairingsForAllocation over input permutations', () => {
  it('should give the same order for every arrangement of distinct pairings', () => {
    const leader = pairing(competitor('m', 7), competitor('n', 2));
    const tiedLow = pairing(competitor('b', 4), competitor('q', 1));
    const tiedHigh = pairing(competitor('k', 3), competitor('c', 2));
    const trailing = pairing(competitor('a', 0), competitor('z', null));
    const input: Pairing[] = [trailing, tiedHigh, leader, tiedLow];

    const orders = permutations(input).map(orderPairingsForAllocation);

    expect(orders).toHaveLength(24);
    for (const order of orders) {
      expect(order).toEqual([leader, tiedLow, tiedHigh, trailing]);
    }
  });

  it('should give the same order for every arrangement of three pairings', () => {
    const first = pairing(competitor('d', 2), competitor('e', 2));
    const second = pairing(competitor('f', 1), competitor('a', 3));
    const third = pairing(competitor('g', 1), competitor('h', 1));

    for (const order of permutations([third, first, second]).map(orderPairingsForAllocation)) {
      expect(order).toEqual([second, first, third]);
    }
  });
});

describe('sortTables', () => {
  it('should sort by table number without changing the input', () => {
    const input = tables(4, 2, 3, 1);

    expect(sortTables(input).map((t) => t.tableNumber)).toEqual([1, 2, 3, 4]);
    expect(input.map((t) => t.tableNumber)).toEqual([4, 2, 3, 1]);
  });
});

describe('AllocationEngine', () => {
  const engine = new AllocationEngine({ clock: fixedClock });

  describe('round 1', () => {
    it('should pass a valid permutation of suggestions through unchanged at cost 0', () => {
      const result = engine.generate({
        pairings: [
          pairing(competitor('a'), competitor('b'), 3),
          pairing(competitor('c'), competitor('d'), 1),
          pairing(competitor('e'), competitor('f'), 2),
        ],
        tables: tables(1, 2, 3),
        roundNumber: 1,
        history: staticHistory({}, {}, 1),
      });

      expect(result.decisions.map((d) => d.tableNumber)).toEqual([3, 1, 2]);
      expect(result.decisions.every((d) => d.audit.totalCost === 0)).toBe(true);
      expect(result.decisions[0].audit.reasons).toEqual(['Round 1 - using suggested table assignment']);
      expect(result.decisions[0].audit.isRound1).toBe(true);
      expect(result.conflicts).toEqual([]);
      expect(result.summary).toBe(SUMMARY_ROUND1_CLEAN);
    });

    it('should move a duplicate and a missing suggestion to the remaining tables', () => {
      const result = engine.generate({
        pairings: [
          pairing(competitor('a'), competitor('b'), 2),
          pairing(competitor('c'), competitor('d'), 2),
          pairing(competitor('e'), competitor('f'), null),
        ],
        tables: tables(1, 2, 3),
        roundNumber: 1,
        history: staticHistory({}, {}, 1),
      });

      expect(result.decisions.map((d) => d.tableNumber)).toEqual([2, 1, 3]);
      expect(result.decisions[1].audit.reasons).toEqual([
        'Round 1 - suggested table 2 already assigned, assigned next available',
      ]);
      expect(result.decisions[2].audit.reasons).toEqual([
        'Round 1 - suggested table number missing, assigned next available',
      ]);
      expect(result.conflicts.filter((c) => c.type === CONFLICT_TYPES.NO_TABLE_AVAILABLE)).toHaveLength(0);
    });

    it('should replace a suggestion that is not a tournament table', () => {
      const result = engine.generate({
        pairings: [pairing(competitor('a'), competitor('b'), 9)],
        tables: tables(1, 2),
        roundNumber: 1,
        history: staticHistory({}, {}, 1),
      });

      expect(result.decisions[0].tableNumber).toBe(1);
      expect(result.decisions[0].suggestedTableNumber).toBe(9);
      expect(result.decisions[0].audit.reasons).toEqual([
        'Round 1 - suggested table 9 not in tournament tables, assigned next available',
      ]);
    });

    it('should leave a pairing without a table when none remain', () => {
      const result = engine.generate({
        pairings: [pairing(competitor('a'), competitor('b'), 1), pairing(competitor('c'), competitor('d'), null)],
        tables: tables(1),
        roundNumber: 1,
        history: staticHistory({}, {}, 1),
      });

      expect(result.decisions.map((d) => d.tableNumber)).toEqual([1, null]);
      expect(result.conflicts).toEqual([
        { type: CONFLICT_TYPES.NO_TABLE_AVAILABLE, message: 'No available tables for pairing Player c vs Player d' },
      ]);
      expect(result.summary).toBe('Round 1 allocations generated with 1 conflict(s).');
    });

    it('should append byes after regular pairings', () => {
      const result = engine.generate({
        pairings: [pairing(competitor('e'), null), pairing(competitor('a'), competitor('b'), 1)],
        tables: tables(1),
        roundNumber: 1,
        history: staticHistory({}, {}, 1),
      });

      expect(result.decisions).toHaveLength(2);
      expect(result.decisions[0].competitorA.id).toBe('a');
      const bye = result.decisions[1];
      expect(bye.tableNumber).toBeNull();
      expect(bye.competitorB).toBeNull();
      expect(bye.audit.isBye).toBe(true);
      expect(bye.audit.isRound1).toBe(true);
      expect(bye.audit.reasons).toEqual([BYE_REASON]);
    });
  });

  describe('greedy rounds', () => {
    const volkusTables = [table(1), table(2), table(3, 1, 'Volkus'), table(4)];

    it('should steer the leading pairing away from its reused table and terrain', () => {
      const leading = pairing(competitor('a', 4), competitor('b', 2));
      const trailing = pairing(competitor('c', 1), competitor('d', 1));

      const result = engine.generate({
        pairings: [trailing, leading],
        tables: volkusTables,
        roundNumber: 2,
        history: staticHistory({ a: [1] }, { a: [1] }),
      });

      expect(result.decisions.map((d) => [d.competitorA.id, d.tableNumber])).toEqual([
        ['a', 2],
        ['c', 1],
      ]);
      expect(result.decisions[0].audit.alternativesConsidered).toEqual({ 1: 100001, 3: 10003, 4: 4 });
      expect(result.decisions[0].audit.costBreakdown).toEqual({ tableReuse: 0, terrainReuse: 0, tableNumber: 2 });
      expect(result.decisions[0].audit.reasons).toEqual(['Table number preference adds 2 for table 2']);
      expect(result.conflicts).toEqual([]);
      expect(result.summary).toBe(SUMMARY_OPTIMAL);
    });

    it('should report unavoidable reuse as conflicts', () => {
      const result = engine.generate({
        pairings: [pairing(competitor('a'), competitor('b'))],
        tables: [table(1, 2, 'Octarius')],
        roundNumber: 3,
        history: staticHistory({ a: [1] }, { b: [2] }, 3),
      });

      expect(result.decisions[0].tableNumber).toBe(1);
      expect(result.decisions[0].audit.totalCost).toBe(110001);
      expect(result.conflicts).toEqual([
        {
          type: CONFLICT_TYPES.TABLE_REUSE,
          message: 'Player a previously played on table 1',
          competitorId: 'a',
          tableNumber: 1,
        },
        {
          type: CONFLICT_TYPES.TERRAIN_REUSE,
          message: 'Player b previously experienced Octarius',
          competitorId: 'b',
          tableNumber: 1,
          terrainTypeId: 2,
        },
      ]);
      expect(result.summary).toBe(
        'Best effort allocation with 1 table reuse conflict(s), 1 terrain reuse conflict(s).'
      );
    });

    it('should prefer the suggested table on an exact cost tie', () => {
      const tieEngine = new AllocationEngine({ costModel: flatCostModel, clock: fixedClock });

      const result = tieEngine.generate({
        pairings: [pairing(competitor('a'), competitor('b'), 3)],
        tables: tables(4, 2, 1, 3),
        roundNumber: 2,
        history: staticHistory(),
      });

      expect(result.decisions[0].tableNumber).toBe(3);
    });

    it('should resolve ties without a suggestion to the lowest table number', () => {
      const tieEngine = new AllocationEngine({ costModel: flatCostModel, clock: fixedClock });

      const result = tieEngine.generate({
        pairings: [pairing(competitor('a'), competitor('b'))],
        tables: tables(4, 2, 1, 3),
        roundNumber: 2,
        history: staticHistory(),
      });

      expect(result.decisions[0].tableNumber).toBe(1);
    });

    it('should never pick a reused table while a fresh one is free', () => {
      const result = engine.generate({
        pairings: [
          pairing(competitor('a', 3), competitor('b', 3)),
          pairing(competitor('c', 2), competitor('d', 2)),
          pairing(competitor('e', 1), competitor('f', 1)),
        ],
        tables: tables(1, 2, 3, 4),
        roundNumber: 4,
        history: staticHistory({ a: [1, 2], b: [3], c: [1], d: [4], e: [2], f: [3, 4] }, {}, 4),
      });

      const assigned = result.decisions.map((d) => d.tableNumber);
      expect(new Set(assigned).size).toBe(assigned.length);
      for (const decision of result.decisions) {
        if (decision.audit.costBreakdown.tableReuse > 0) {
          for (const cost of Object.values(decision.audit.alternativesConsidered)) {
            expect(cost).toBeGreaterThanOrEqual(COST_TABLE_REUSE);
          }
        }
      }
      expect(assigned).toEqual([4, 2, 1]);
    });

    it('should append byes with zero cost', () => {
      const result = engine.generate({
        pairings: [pairing(competitor('e'), null), pairing(competitor('a'), competitor('b'))],
        tables: tables(1),
        roundNumber: 2,
        history: staticHistory(),
      });

      const bye = result.decisions[1];
      expect(bye.competitorA.id).toBe('e');
      expect(bye.audit).toMatchObject({
        totalCost: 0,
        costBreakdown: { tableReuse: 0, terrainReuse: 0, suggestedTableMismatch: 0 },
        reasons: [BYE_REASON],
        isRound1: false,
        isBye: true,
      });
    });

    it('should prefer the highest allowed table number over a terrain reuse', () => {
      const result = engine.generate({
        pairings: [pairing(competitor('a'), competitor('b'))],
        tables: [table(1, 1, 'Volkus'), table(9999)],
        roundNumber: 2,
        history: staticHistory({}, { a: [1] }),
      });

      expect(result.decisions[0].tableNumber).toBe(9999);
      expect(result.decisions[0].audit.alternativesConsidered).toEqual({ 1: 10001 });
      expect(result.decisions[0].audit.totalCost).toBe(9999);
      expect(result.summary).toBe(SUMMARY_OPTIMAL);
    });

    it('should reject a table number that would outweigh a terrain reuse', () => {
      expect(() =>
        engine.generate({
          pairings: [pairing(competitor('a'), competitor('b'))],
          tables: [table(1, 1, 'Volkus'), table(10002)],
          roundNumber: 2,
          history: staticHistory({}, { a: [1] }),
        })
      ).toThrow(ValidationError);
    });

    it('should throw when pairings outnumber tables', () => {
      expect(() =>
        engine.generate({
          pairings: [pairing(competitor('a'), competitor('b')), pairing(competitor('c'), competitor('d'))],
          tables: tables(1),
          roundNumber: 2,
          history: staticHistory(),
        })
      ).toThrow(InsufficientTablesError);
    });
  });

  it('should stamp frozen audit records with the clock time', () => {
    const result = engine.generate({
      pairings: [pairing(competitor('a'), competitor('b'), 1)],
      tables: tables(1),
      roundNumber: 1,
      history: staticHistory({}, {}, 1),
    });

    expect(result.decisions[0].audit.timestamp).toBe('2026-03-14T09:00:00.000Z');
    expect(Object.isFrozen(result.decisions[0].audit)).toBe(true);
    expect(Object.isFrozen(result.decisions[0].audit.reasons)).toBe(true);
  });

  it('should reject a round number below 1', () => {
    expect(() =>
      engine.generate({ pairings: [], tables: tables(1), roundNumber: 0, history: staticHistory() })
    ).toThrow(ValidationError);
  });

  it('should refuse a history scoped to another round', () => {
    expect(() =>
      engine.generate({
        pairings: [pairing(competitor('a'), competitor('b'))],
        tables: tables(1, 2),
        roundNumber: 3,
        history: staticHistory({ a: [1] }, {}, 4),
      })
    ).toThrow(new InvariantViolationError('History is scoped to a different round'));
  });

  it('should reject duplicate table numbers', () => {
    expect(() =>
      engine.generate({ pairings: [], tables: tables(1, 1), roundNumber: 2, history: staticHistory() })
    ).toThrow(ValidationError);
  });
});
