import type { Competitor, CompetitorSnapshot, Pairing } from './types';

/** A pairing narrowed to one that has an opponent. */
export type SeatedPairing = Pairing & { competitorB: Competitor };

export function isSeatedPairing(pairing: Pairing): pairing is SeatedPairing {
  return pairing.competitorB !== null;
}

/** Both competitors in seating order; a bye has only one. */
export function competitorsOf(pairing: Pairing): Competitor[] {
  return pairing.competitorB ? [pairing.competitorA, pairing.competitorB] : [pairing.competitorA];
}

/** Tournament-to-date score of both competitors, unknown scores counting as 0. */
export function combinedTotalScore(pairing: Pairing): number {
  return competitorsOf(pairing).reduce((sum, competitor) => sum + (competitor.totalScore ?? 0), 0);
}

/** The lexicographically smaller competitor id, used as a deterministic tie-break. */
export function minCompetitorId(pairing: Pairing): string {
  const ids = competitorsOf(pairing).map((competitor) => competitor.id);
  return ids.reduce((min, id) => (id < min ? id : min));
}

export function snapshotOf(competitor: Competitor): CompetitorSnapshot {
  return {
    id: competitor.id,
    name: competitor.name,
    score: competitor.roundScore,
  };
}

export function describePairing(pairing: Pairing): string {
  return pairing.competitorB
    ? `${pairing.competitorA.name} vs ${pairing.competitorB.name}`
    : `${pairing.competitorA.name} (bye)`;
}
