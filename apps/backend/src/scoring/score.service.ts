import { Inject, Injectable } from '@nestjs/common';
import winston from 'winston';
import {
  Ball,
  Commentary,
  DeliveryInput,
  LiveScoreSummary,
  MatchOutcome,
  Scorecard,
} from '@crease/shared-types';
import { APP_LOGGER } from '../common/logger/logger';
import {
  InvalidMatchStateException,
  InvalidScoreUpdateException,
} from '../common/exceptions/scoring.exceptions';
import { ScoreBroadcaster } from '../broadcast/score-broadcaster';
import { createBall } from './ball';
import { generateCommentary } from './commentary';
import { InningsEngine } from './innings-engine';
import { MatchState } from './match-state';
import { buildScorecard } from './scorecard';
import { SCORING_STRATEGY, ScoringStrategy } from './strategies/scoring-strategy';

/**
 * Scoring commands and queries for a match.
 *
 * Every command checks the match is live, lets the innings engine apply the
 * change, then broadcasts. Callers serialize commands per match.
 */
@Injectable()
export class ScoreService {
  constructor(
    @Inject(SCORING_STRATEGY) private readonly strategy: ScoringStrategy,
    private readonly broadcaster: ScoreBroadcaster,
    @Inject(APP_LOGGER) private readonly logger: winston.Logger,
  ) {}

  get strategyName(): string {
    return this.strategy.name;
  }

  /**
   * Open the next innings. Innings after the first get the target the
   * strategy computes (none for the early innings of a two-innings format).
   */
  startInnings(
    match: MatchState,
    battingTeamId: string,
    bowlingTeamId: string,
    strikerId: string,
    nonStrikerId: string,
    bowlerId?: string | null,
  ): InningsEngine {
    this.assertLive(match, 'start an innings');

    const innings = match.openInnings({ battingTeamId, bowlingTeamId, strikerId, nonStrikerId, bowlerId });
    if (innings.inningsNumber > 1) {
      const target = this.strategy.calculateTarget(match);
      if (target !== null) {
        innings.setTarget(Math.max(1, target));
      }
    }

    this.logger.info('Innings started', {
      matchId: match.id,
      inningsNumber: innings.inningsNumber,
      battingTeam: match.teamName(battingTeamId),
      target: innings.target,
    });

    this.broadcaster.notify('scoreUpdate', match, { summary: match.liveScore() });
    return innings;
  }

  /**
   * Apply a fully specified delivery to the active innings
   */
  recordBall(match: MatchState, ball: Ball): Commentary {
    this.assertLive(match, 'record a ball');
    const innings = this.requireActiveInnings(match);

    innings.addBall(ball);

    const commentary = generateCommentary(match.id, ball, (id) => match.playerName(id));
    match.addCommentary(commentary);

    this.broadcaster.notify('ballBowled', match, { ball, commentary });
    if (ball.isWicket) {
      this.broadcaster.notify('wicket', match, {
        ball,
        wickets: innings.wickets,
        liveScore: match.liveScore().text,
      });
    }
    this.broadcaster.notify('scoreUpdate', match, { summary: match.liveScore() });

    if (!innings.isInProgress()) {
      this.endInnings(match);
    }
    return commentary;
  }

  /**
   * Record a delivery as a scorer reports it: the position in the over comes
   * from the innings, and the striker and bowler default to those at the crease.
   */
  recordDelivery(match: MatchState, delivery: DeliveryInput): Commentary {
    this.assertLive(match, 'record a ball');
    const innings = this.requireActiveInnings(match);

    const batsmanId = delivery.batsmanId ?? innings.striker;
    if (!batsmanId) {
      throw new InvalidScoreUpdateException('No batsman on strike; send in a new batsman first');
    }
    const bowlerId = delivery.bowlerId ?? innings.bowler;
    if (!bowlerId) {
      throw new InvalidScoreUpdateException('No bowler set for this over');
    }

    const ball = createBall({
      ...delivery,
      inningsNumber: innings.inningsNumber,
      overNumber: innings.oversCompleted,
      ballInOver: innings.legalBallsInOver + 1,
      batsmanId,
      bowlerId,
      nonStrikerId: delivery.nonStrikerId ?? innings.nonStriker,
    });
    return this.recordBall(match, ball);
  }

  sendNewBatsman(match: MatchState, playerId: string): void {
    this.requireActiveInnings(match).sendNewBatsman(playerId);
  }

  changeBowler(match: MatchState, playerId: string): void {
    this.requireActiveInnings(match).changeBowler(playerId);
  }

  /**
   * Close the current innings. Completes the match when that decides it.
   */
  endInnings(match: MatchState): MatchOutcome | null {
    this.assertLive(match, 'end an innings');
    const innings = match.currentInnings();
    if (!innings) {
      throw new InvalidScoreUpdateException('There is no innings to end');
    }

    innings.close();
    const liveScore = match.liveScore().text;
    this.logger.info('Innings ended', {
      matchId: match.id,
      inningsNumber: innings.inningsNumber,
      status: innings.status,
      score: liveScore,
    });
    this.broadcaster.notify('inningsEnd', match, {
      inningsNumber: innings.inningsNumber,
      status: innings.status,
      liveScore,
    });

    const outcome = match.decideResult();
    if (outcome) {
      match.complete(outcome);
      this.logger.info('Match completed', { matchId: match.id, result: outcome.result, description: outcome.description });
      this.broadcaster.notify('matchEnd', match, {
        result: outcome.result,
        winnerTeamId: outcome.winnerTeamId,
        description: outcome.description,
      });
    }
    return outcome;
  }

  declareInnings(match: MatchState): MatchOutcome | null {
    this.assertLive(match, 'declare');
    this.requireActiveInnings(match).declare();
    return this.endInnings(match);
  }

  /**
   * Rain curtailment: the current innings and every later one get the
   * reduced allotment, and a chase has its target recomputed.
   */
  reduceOvers(match: MatchState, overs: number): void {
    this.assertLive(match, 'reduce overs');
    const allotted = match.oversPerInnings;
    if (!match.format.limitedOvers || allotted === null) {
      throw new InvalidScoreUpdateException(`Overs cannot be reduced in a ${match.format.displayName}`);
    }

    const innings = match.activeInnings();
    if (innings) {
      innings.curtailOvers(overs);
    } else if (!Number.isInteger(overs) || overs < 1 || overs > allotted) {
      throw new InvalidScoreUpdateException(`Reduced overs must be between 1 and ${allotted} (got ${overs})`);
    }
    match.reviseOvers(overs);

    if (innings && innings.inningsNumber > 1) {
      const target = this.strategy.calculateTarget(match);
      if (target !== null) {
        innings.setTarget(Math.max(1, target));
      }
    }

    this.logger.info('Overs reduced', {
      matchId: match.id,
      overs,
      inningsNumber: innings?.inningsNumber ?? null,
      target: innings?.target ?? null,
    });

    this.broadcaster.notify('scoreUpdate', match, { summary: match.liveScore() });
    if (innings && !innings.isInProgress()) {
      this.endInnings(match);
    }
  }

  getLiveScore(match: MatchState): LiveScoreSummary {
    return match.liveScore();
  }

  getRequiredRunRate(match: MatchState): number {
    return this.strategy.calculateRequiredRunRate(match);
  }

  getProjectedScore(match: MatchState): number {
    const innings = match.latestInnings();
    if (!innings) {
      return 0;
    }
    return this.strategy.calculateProjectedScore(innings, innings.allottedOvers);
  }

  getWinProbability(match: MatchState, forBattingTeam = true): number {
    return this.strategy.calculateWinProbability(match, forBattingTeam);
  }

  getScorecard(match: MatchState): Scorecard {
    return buildScorecard(match);
  }

  private assertLive(match: MatchState, action: string): void {
    if (!match.isLive()) {
      throw new InvalidMatchStateException(`Cannot ${action}: match ${match.id} is ${match.status}`);
    }
  }

  private requireActiveInnings(match: MatchState): InningsEngine {
    const innings = match.activeInnings();
    if (!innings) {
      throw new InvalidScoreUpdateException(`Match ${match.id} has no innings in progress`);
    }
    return innings;
  }
}
