import { createSilentLogger } from '../common/logger/logger';
import { ScoreBroadcaster } from '../broadcast/score-broadcaster';
import { MatchState } from '../scoring/match-state';
import { ScoreService } from '../scoring/score.service';
import { StandardScoringStrategy } from '../scoring/strategies/standard-scoring.strategy';
import { makeMatch } from '../testing/fixtures';
import { LiveScoreStore } from './redis.service';
import { RedisScoreMirror } from './redis-score-mirror.observer';

class FakeLiveScoreStore implements LiveScoreStore {
  readonly liveScores = new Map<string, Record<string, string>>();
  readonly commentary = new Map<string, string[]>();
  readonly results = new Map<string, Record<string, string>>();
  failWith: Error | null = null;

  constructor(private readonly enabled = true) {}

  isEnabled(): boolean {
    return this.enabled;
  }

  async writeLiveScore(matchId: string, fields: Record<string, string>): Promise<void> {
    this.check();
    this.liveScores.set(matchId, fields);
  }

  async pushCommentary(matchId: string, entry: string, limit: number): Promise<void> {
    this.check();
    const list = [entry, ...(this.commentary.get(matchId) ?? [])];
    this.commentary.set(matchId, list.slice(0, limit));
  }

  async writeResult(matchId: string, fields: Record<string, string>): Promise<void> {
    this.check();
    this.results.set(matchId, fields);
  }

  private check() {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

describe('RedisScoreMirror', () => {
  const logger = createSilentLogger();
  let broadcaster: ScoreBroadcaster;
  let service: ScoreService;
  let match: MatchState;

  beforeEach(() => {
    broadcaster = new ScoreBroadcaster(logger);
    service = new ScoreService(new StandardScoringStrategy(), broadcaster, logger);
    match = makeMatch();
    match.start();
  });

  function createMirror(store: FakeLiveScoreStore): RedisScoreMirror {
    const mirror = new RedisScoreMirror(store, broadcaster, logger);
    mirror.onModuleInit();
    return mirror;
  }

  it('stays unregistered when the store is disabled', () => {
    createMirror(new FakeLiveScoreStore(false));
    expect(broadcaster.observerCount()).toBe(0);
  });

  it('writes the live score as a flat hash', async () => {
    const store = new FakeLiveScoreStore();
    const mirror = createMirror(store);

    service.startInnings(match, 'ind', 'aus', 'ind1', 'ind2', 'aus1');
    await mirror.flush();

    expect(store.liveScores.get('match-1')).toEqual({
      status: 'LIVE',
      inningsNumber: '1',
      battingTeamId: 'ind',
      battingTeamName: 'India',
      runs: '0',
      wickets: '0',
      overs: '0.0',
      runRate: '0',
      target: '',
      runsRequired: '',
      ballsRemaining: '120',
      text: 'India: 0/0 (0.0 ov)',
    });
  });

  it('pushes commentary newest first', async () => {
    const store = new FakeLiveScoreStore();
    const mirror = createMirror(store);

    service.startInnings(match, 'ind', 'aus', 'ind1', 'ind2', 'aus1');
    service.recordDelivery(match, { runsOffBat: 1 });
    service.recordDelivery(match, { runsOffBat: 4 });
    await mirror.flush();

    const entries = (store.commentary.get('match-1') ?? []).map((entry) => JSON.parse(entry).text);
    expect(entries).toEqual([
      'Australia 1 to India 2, FOUR! 4 runs',
      'Australia 1 to India 1, 1 run(s)',
    ]);
    expect(store.liveScores.get('match-1')?.runs).toBe('5');
  });

  it('writes the result when the match ends', async () => {
    const store = new FakeLiveScoreStore();
    const mirror = createMirror(store);

    match.abandon('Rain');
    broadcaster.notify('matchEnd', match, {
      result: match.result,
      winnerTeamId: match.winnerTeamId,
      description: match.resultDescription,
    });
    await mirror.flush();

    expect(store.results.get('match-1')).toEqual({
      status: 'ABANDONED',
      result: 'NO_RESULT',
      winnerTeamId: '',
      description: 'Rain',
    });
  });

  it('logs a failed write without interrupting scoring', async () => {
    const store = new FakeLiveScoreStore();
    store.failWith = new Error('connection lost');
    const warn = jest.spyOn(logger, 'warn');
    const mirror = createMirror(store);

    expect(() => service.startInnings(match, 'ind', 'aus', 'ind1', 'ind2', 'aus1')).not.toThrow();
    await mirror.flush();

    expect(warn).toHaveBeenCalledWith('Redis mirror write failed', {
      matchId: 'match-1',
      write: 'live score',
      error: 'connection lost',
    });
    warn.mockRestore();
  });

  it('unregisters on destroy', async () => {
    const mirror = createMirror(new FakeLiveScoreStore());
    await mirror.onModuleDestroy();
    expect(broadcaster.observerCount()).toBe(0);
  });
});
