import { BALLS_PER_OVER, MAX_WICKETS, totalInningsFor } from '@crease/constants';
import { InningsEngine } from '../innings-engine';
import { MatchState } from '../match-state';
import { ScoringStrategy } from './scoring-strategy';

/**
 * Plain run-rate arithmetic: target is the opponent's aggregate plus one,
 * projections extrapolate the current run rate.
 */
export class StandardScoringStrategy implements ScoringStrategy {
  readonly name = 'standard' as const;

  calculateTarget(match: MatchState): number | null {
    const innings = match.latestInnings();
    if (!innings || innings.inningsNumber < 2) {
      return null;
    }
    // Only the deciding innings of the format chases a target
    if (innings.inningsNumber !== totalInningsFor(match.format)) {
      return null;
    }
    const opponentRuns = match.aggregateFor(innings.bowlingTeamId);
    const ownRuns = match.aggregateFor(innings.battingTeamId, innings);
    return opponentRuns - ownRuns + 1;
  }

  calculateRequiredRunRate(match: MatchState): number {
    const chasing = match.latestInnings();
    if (!chasing || chasing.target === null) {
      return 0;
    }
    const runsRequired = chasing.target - chasing.totalRuns;
    if (runsRequired <= 0) {
      return 0;
    }
    const ballsRemaining = chasing.ballsRemaining;
    if (ballsRemaining === null) {
      return 0;
    }
    const oversRemaining = ballsRemaining / BALLS_PER_OVER;
    return oversRemaining > 0 ? runsRequired / oversRemaining : Number.POSITIVE_INFINITY;
  }

  calculateProjectedScore(innings: InningsEngine, totalOvers: number | null): number {
    const balls = innings.legalBalls;
    if (totalOvers === null || balls === 0) {
      return innings.totalRuns;
    }
    if (!innings.isInProgress()) {
      return innings.totalRuns;
    }
    return Math.floor((innings.totalRuns / balls) * totalOvers * BALLS_PER_OVER);
  }

  calculateWinProbability(match: MatchState, forBattingTeam = true): number {
    const probability = this.chaseProbability(match);
    return forBattingTeam ? probability : 1 - probability;
  }

  private chaseProbability(match: MatchState): number {
    const chasing = match.latestInnings();
    const first = match.firstInnings();
    if (!chasing || !first || chasing === first || chasing.target === null) {
      return 0.5;
    }

    const runsRequired = chasing.target - chasing.totalRuns;
    if (runsRequired <= 0) {
      return 1;
    }
    const ballsRemaining = chasing.ballsRemaining;
    const wicketsInHand = MAX_WICKETS - chasing.wickets;
    if (ballsRemaining === 0 || wicketsInHand === 0) {
      return 0;
    }
    if (ballsRemaining === null || first.allottedOvers === null) {
      return 0.5;
    }

    const firstInningsRunsPerBall = first.totalRuns / (first.allottedOvers * BALLS_PER_OVER);
    const expectedRuns = ballsRemaining * firstInningsRunsPerBall * (wicketsInHand / MAX_WICKETS);
    return Math.min(1, Math.max(0, expectedRuns / runsRequired));
  }
}
