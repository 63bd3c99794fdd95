import { ScoringStrategyName } from '@crease/constants';
import { InningsEngine } from '../innings-engine';
import { MatchState } from '../match-state';

/**
 * DI token for the strategy a ScoreService is built with
 */
export const SCORING_STRATEGY = Symbol('SCORING_STRATEGY');

/**
 * Derived metrics for a live match. Implementations are stateless and
 * never mutate the match.
 */
export interface ScoringStrategy {
  readonly name: ScoringStrategyName;

  /** Target for the latest innings, or null when that innings chases nothing */
  calculateTarget(match: MatchState): number | null;

  calculateRequiredRunRate(match: MatchState): number;

  calculateProjectedScore(innings: InningsEngine, totalOvers: number | null): number;

  /** Probability in [0, 1]; for the chasing side unless forBattingTeam is false */
  calculateWinProbability(match: MatchState, forBattingTeam?: boolean): number;
}
