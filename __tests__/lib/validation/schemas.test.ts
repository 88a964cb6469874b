import { ValidationError } from '@/lib/error-handling';
import {
  auditRecordSchema,
  idSchema,
  pairingsSchema,
  parseOrThrow,
  roundNumberSchema,
  tablesSchema,
  tableNumberSchema,
} from '@/lib/validation/schemas';

const player = (id: string) => ({ id, name: `Player ${id}`, roundScore: 0 });

describe('Validation schemas', () => {
  describe('pairingsSchema', () => {
    it('should default missing totals and suggestions to null', () => {
      const parsed = parseOrThrow(pairingsSchema, [{ competitorA: player('a'), competitorB: null }], 'pairings');

      expect(parsed).toEqual([
        {
          competitorA: { id: 'a', name: 'Player a', roundScore: 0, totalScore: null },
          competitorB: null,
          suggestedTableNumber: null,
        },
      ]);
    });

    it('should trim competitor names', () => {
      const parsed = parseOrThrow(
        pairingsSchema,
        [{ competitorA: { ...player('a'), name: '  Ana  ' }, competitorB: player('b') }],
        'pairings'
      );

      expect(parsed[0].competitorA.name).toBe('Ana');
    });

    it('should reject a competitor in two pairings', () => {
      const result = pairingsSchema.safeParse([
        { competitorA: player('a'), competitorB: player('b') },
        { competitorA: player('c'), competitorB: player('a') },
      ]);

      expect(result.success).toBe(false);
      expect(result.error?.issues[0].message).toBe('Competitor a appears in more than one pairing');
      expect(result.error?.issues[0].path).toEqual([1]);
    });

    it('should reject a suggested table of 0', () => {
      const result = pairingsSchema.safeParse([
        { competitorA: player('a'), competitorB: player('b'), suggestedTableNumber: 0 },
      ]);

      expect(result.success).toBe(false);
    });
  });

  describe('tableNumberSchema', () => {
    it('should accept numbers up to 9999', () => {
      expect(tableNumberSchema.safeParse(9999).success).toBe(true);
    });

    it('should reject numbers from 10000 on', () => {
      const result = tableNumberSchema.safeParse(10000);

      expect(result.success).toBe(false);
      expect(result.error?.issues[0].message).toBe('Table number must be at most 9999');
    });
  });

  describe('tablesSchema', () => {
    it('should reject duplicate table numbers', () => {
      const result = tablesSchema.safeParse([
        { tableNumber: 1, terrainTypeId: null, terrainTypeName: null },
        { tableNumber: 1, terrainTypeId: 2, terrainTypeName: 'Octarius' },
      ]);

      expect(result.success).toBe(false);
      expect(result.error?.issues[0].path).toEqual([1, 'tableNumber']);
    });
  });

  describe('auditRecordSchema', () => {
    it('should reject a breakdown mixing both shapes', () => {
      const result = auditRecordSchema.safeParse({
        timestamp: '2026-03-14T09:00:00.000Z',
        totalCost: 0,
        costBreakdown: { tableReuse: 0, terrainReuse: 0, tableNumber: 1, suggestedTableMismatch: 0 },
        reasons: [],
        alternativesConsidered: {},
        isRound1: true,
        isBye: false,
        conflicts: [],
      });

      expect(result.success).toBe(false);
    });
  });

  describe('parseOrThrow', () => {
    it('should name the input and list issues by path', () => {
      expect(() => parseOrThrow(roundNumberSchema, 0, 'round number')).toThrow(
        'Invalid round number. Validation failed: Round number must be at least 1'
      );
    });

    it('should attach the issues as details', () => {
      let thrown: unknown;
      try {
        parseOrThrow(idSchema, 1.5, 'allocation id');
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ValidationError);
      expect(thrown).toMatchObject({ details: { issues: [{ path: [], message: 'ID must be an integer' }] } });
    });
  });
});
