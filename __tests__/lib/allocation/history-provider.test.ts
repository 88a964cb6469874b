import { TournamentHistory, type HistorySource } from '@/lib/allocation/history-provider';

function mockSource(): HistorySource & { tablesUsedBefore: jest.Mock; terrainsUsedBefore: jest.Mock } {
  return {
    tablesUsedBefore: jest.fn().mockReturnValue([1, 4]),
    terrainsUsedBefore: jest.fn().mockReturnValue([2]),
  };
}

describe('TournamentHistory', () => {
  it('should return empty sets in round 1 without querying the source', () => {
    const source = mockSource();
    const history = new TournamentHistory(5, 1, source);

    expect(history.usedTables('p1').size).toBe(0);
    expect(history.usedTerrains('p1').size).toBe(0);
    expect(source.tablesUsedBefore).not.toHaveBeenCalled();
    expect(source.terrainsUsedBefore).not.toHaveBeenCalled();
  });

  it('should query the source with its own tournament and round', () => {
    const source = mockSource();
    const history = new TournamentHistory(5, 3, source);

    expect([...history.usedTables('p1')]).toEqual([1, 4]);
    expect([...history.usedTerrains('p1')]).toEqual([2]);
    expect(source.tablesUsedBefore).toHaveBeenCalledWith(5, 'p1', 3);
    expect(source.terrainsUsedBefore).toHaveBeenCalledWith(5, 'p1', 3);
  });

  it('should cache lookups per competitor', () => {
    const source = mockSource();
    const history = new TournamentHistory(5, 2, source);

    history.usedTables('p1');
    history.usedTables('p1');
    history.usedTables('p2');

    expect(source.tablesUsedBefore).toHaveBeenCalledTimes(2);
  });

  it('should query again after clearCache', () => {
    const source = mockSource();
    const history = new TournamentHistory(5, 2, source);

    history.usedTerrains('p1');
    history.clearCache();
    history.usedTerrains('p1');

    expect(source.terrainsUsedBefore).toHaveBeenCalledTimes(2);
  });

  it('should not share cached results between instances', () => {
    const source = mockSource();

    new TournamentHistory(5, 2, source).usedTables('p1');
    new TournamentHistory(5, 2, source).usedTables('p1');

    expect(source.tablesUsedBefore).toHaveBeenCalledTimes(2);
  });
});
