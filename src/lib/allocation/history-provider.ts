/**
 * Tournament History
 *
 * Answers "which tables and terrain types has this competitor already played
 * on?" for one tournament, looking only at rounds strictly before the round
 * being generated or edited.
 *
 * An instance is scoped to a single (tournament, round) pair and to a single
 * generation or edit call. Lookups are memoized per competitor for the
 * lifetime of the instance, since a competitor's past rounds cannot change
 * while the current round is being allocated. Nothing is cached at module
 * level; each run constructs its own instance.
 *
 * Usage:
 *   const history = new TournamentHistory(tournamentId, roundNumber, repository);
 *   history.usedTables('player-42'); // ReadonlySet<number>
 */

import type { HistoryProvider } from './types';

/**
 * Storage contract backing the history provider. Implemented by the
 * repository; tests can supply a plain object.
 */
export interface HistorySource {
  /** Table numbers the competitor was seated at in rounds before `beforeRound`. */
  tablesUsedBefore(tournamentId: number, competitorId: string, beforeRound: number): readonly number[];
  /** Terrain type ids the competitor played on in rounds before `beforeRound`. */
  terrainsUsedBefore(tournamentId: number, competitorId: string, beforeRound: number): readonly number[];
}

const EMPTY: ReadonlySet<number> = new Set<number>();

export class TournamentHistory implements HistoryProvider {
  private readonly tableCache = new Map<string, ReadonlySet<number>>();
  private readonly terrainCache = new Map<string, ReadonlySet<number>>();

  constructor(
    public readonly tournamentId: number,
    public readonly currentRound: number,
    private readonly source: HistorySource
  ) {}

  usedTables(competitorId: string): ReadonlySet<number> {
    return this.lookup(this.tableCache, competitorId, () =>
      this.source.tablesUsedBefore(this.tournamentId, competitorId, this.currentRound)
    );
  }

  usedTerrains(competitorId: string): ReadonlySet<number> {
    return this.lookup(this.terrainCache, competitorId, () =>
      this.source.terrainsUsedBefore(this.tournamentId, competitorId, this.currentRound)
    );
  }

  clearCache(): void {
    this.tableCache.clear();
    this.terrainCache.clear();
  }

  private lookup(
    cache: Map<string, ReadonlySet<number>>,
    competitorId: string,
    query: () => readonly number[]
  ): ReadonlySet<number> {
    // Round 1 has no earlier rounds to look at
    if (this.currentRound <= 1) {
      return EMPTY;
    }

    const cached = cache.get(competitorId);
    if (cached) {
      return cached;
    }

    const values = new Set(query());
    cache.set(competitorId, values);
    return values;
  }
}
