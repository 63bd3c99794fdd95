import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import winston from 'winston';
import { BallBowledEvent, LiveScoreSummary, MatchEndEvent, ScoreUpdateEvent } from '@crease/shared-types';
import { COMMENTARY_MIRROR_LIMIT } from '@crease/constants';
import { APP_LOGGER } from '../common/logger/logger';
import { ScoreBroadcaster } from '../broadcast/score-broadcaster';
import { ScoreObserver } from '../broadcast/score-observer';
import { MatchState } from '../scoring/match-state';
import { LIVE_SCORE_STORE, LiveScoreStore } from './redis.service';

const text = (value: number | string | null) => (value === null ? '' : String(value));

export function toLiveScoreHash(summary: LiveScoreSummary): Record<string, string> {
  return {
    status: summary.matchStatus,
    inningsNumber: text(summary.inningsNumber),
    battingTeamId: text(summary.battingTeamId),
    battingTeamName: text(summary.battingTeamName),
    runs: text(summary.runs),
    wickets: text(summary.wickets),
    overs: summary.overs,
    runRate: text(summary.runRate),
    target: text(summary.target),
    runsRequired: text(summary.runsRequired),
    ballsRemaining: text(summary.ballsRemaining),
    text: summary.text,
  };
}

/**
 * Copies live scores, recent commentary and results into the store.
 * Writes run in the background; a failed write is logged and dropped.
 */
@Injectable()
export class RedisScoreMirror implements ScoreObserver, OnModuleInit, OnModuleDestroy {
  readonly observerName = 'RedisScoreMirror';

  private readonly pending = new Set<Promise<void>>();

  constructor(
    @Inject(LIVE_SCORE_STORE) private readonly store: LiveScoreStore,
    private readonly broadcaster: ScoreBroadcaster,
    @Inject(APP_LOGGER) private readonly logger: winston.Logger,
  ) {}

  onModuleInit() {
    if (this.store.isEnabled()) {
      this.broadcaster.register(this);
    }
  }

  async onModuleDestroy() {
    this.broadcaster.remove(this);
    await this.flush();
  }

  onScoreUpdate(match: MatchState, event: ScoreUpdateEvent) {
    this.track(match, 'live score', this.store.writeLiveScore(match.id, toLiveScoreHash(event.summary)));
  }

  onBallBowled(match: MatchState, event: BallBowledEvent) {
    this.track(
      match,
      'commentary',
      this.store.pushCommentary(match.id, JSON.stringify(event.commentary), COMMENTARY_MIRROR_LIMIT),
    );
  }

  onMatchEnd(match: MatchState, event: MatchEndEvent) {
    this.track(
      match,
      'result',
      this.store.writeResult(match.id, {
        status: match.status,
        result: text(event.result),
        winnerTeamId: text(event.winnerTeamId),
        description: text(event.description),
      }),
    );
  }

  /**
   * Wait for every write started so far
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  private track(match: MatchState, what: string, write: Promise<void>) {
    const tracked: Promise<void> = write
      .catch((error: unknown) => {
        this.logger.warn('Redis mirror write failed', {
          matchId: match.id,
          write: what,
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }
}
