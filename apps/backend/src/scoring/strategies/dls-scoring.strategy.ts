import { BALLS_PER_OVER, DLS_RESOURCE_TABLE, DlsResourceTable, MAX_WICKETS } from '@crease/constants';
import { InningsEngine } from '../innings-engine';
import { MatchState } from '../match-state';
import { ScoringStrategy } from './scoring-strategy';
import { StandardScoringStrategy } from './standard-scoring.strategy';

/**
 * Simplified Duckworth-Lewis-Stern targets for rain-affected limited-overs matches.
 *
 * Resources come from a fixed table keyed by the nearest-lower overs bucket
 * and wickets lost, with no interpolation between buckets. The numbers
 * approximate the method; they are not the official DLS-Stern tables.
 * Formats without an overs limit fall back to standard scoring.
 */
export class DLSScoringStrategy implements ScoringStrategy {
  readonly name = 'dls' as const;

  private readonly fallback = new StandardScoringStrategy();

  constructor(private readonly table: DlsResourceTable = DLS_RESOURCE_TABLE) {}

  calculateTarget(match: MatchState): number | null {
    if (!match.format.limitedOvers) {
      return this.fallback.calculateTarget(match);
    }
    const innings = match.latestInnings();
    if (!innings || innings.inningsNumber < 2) {
      return null;
    }
    return this.calculateDLSTarget(match);
  }

  calculateRequiredRunRate(match: MatchState): number {
    if (!match.format.limitedOvers) {
      return this.fallback.calculateRequiredRunRate(match);
    }
    const chasing = match.innings[1];
    if (!chasing) {
      return 0;
    }
    const runsRequired = this.calculateDLSTarget(match) - chasing.totalRuns;
    if (runsRequired <= 0) {
      return 0;
    }
    const oversRemaining = this.oversRemaining(chasing);
    return oversRemaining > 0 ? runsRequired / oversRemaining : Number.POSITIVE_INFINITY;
  }

  calculateProjectedScore(innings: InningsEngine, totalOvers: number | null): number {
    if (totalOvers === null) {
      return this.fallback.calculateProjectedScore(innings, totalOvers);
    }
    const oversRemaining = totalOvers - innings.legalBalls / BALLS_PER_OVER;
    const resourcesUsed =
      this.getResourcePercentage(totalOvers, 0) - this.getResourcePercentage(oversRemaining, innings.wickets);

    if (resourcesUsed <= 0) {
      return innings.totalRuns;
    }

    const resourcesRemaining = 100 - resourcesUsed;
    const runsPerResource = innings.totalRuns / resourcesUsed;
    return innings.totalRuns + Math.floor(runsPerResource * resourcesRemaining);
  }

  calculateWinProbability(match: MatchState, forBattingTeam = true): number {
    if (!match.format.limitedOvers) {
      return this.fallback.calculateWinProbability(match, forBattingTeam);
    }
    const probability = this.chaseProbability(match);
    return forBattingTeam ? probability : 1 - probability;
  }

  /**
   * Par score plus one, scaling the first-innings total by the ratio of
   * resources available to each side at the start of its innings
   */
  calculateDLSTarget(match: MatchState): number {
    const first = match.firstInnings();
    if (!first) {
      return 0;
    }

    const fullOvers = match.format.oversPerInnings ?? 0;
    const team1Overs = first.allottedOvers ?? fullOvers;
    const team2Overs = match.innings[1]?.allottedOvers ?? match.oversPerInnings ?? fullOvers;

    const team1Resources = this.getResourcePercentage(team1Overs, 0);
    const team2Resources = this.getResourcePercentage(team2Overs, 0);
    if (team1Resources <= 0) {
      return first.totalRuns + 1;
    }

    const parScore = first.totalRuns * (team2Resources / team1Resources);
    return Math.ceil(parScore) + 1;
  }

  /**
   * Resource percentage for the bucket at or below oversRemaining
   */
  getResourcePercentage(oversRemaining: number, wicketsLost: number): number {
    if (oversRemaining <= 0 || wicketsLost >= MAX_WICKETS) {
      return 0;
    }

    const { oversThresholds, resources } = this.table;
    let oversIndex = oversThresholds.findIndex((threshold) => oversRemaining >= threshold);
    if (oversIndex === -1) {
      oversIndex = oversThresholds.length - 1;
    }
    const wicketsIndex = Math.min(Math.max(wicketsLost, 0), MAX_WICKETS - 1);

    return resources[oversIndex][wicketsIndex];
  }

  private chaseProbability(match: MatchState): number {
    const first = match.firstInnings();
    const chasing = match.innings[1];
    if (!first || !chasing) {
      return 0.5;
    }

    const runsRequired = this.calculateDLSTarget(match) - chasing.totalRuns;
    if (runsRequired <= 0) {
      return 1;
    }

    const resourcesRemaining = this.getResourcePercentage(this.oversRemaining(chasing), chasing.wickets);
    const expectedRuns = (resourcesRemaining / 100) * first.totalRuns;
    return Math.min(1, Math.max(0, expectedRuns / Math.max(runsRequired, 1)));
  }

  private oversRemaining(innings: InningsEngine): number {
    const balls = innings.ballsRemaining;
    return balls === null ? 0 : balls / BALLS_PER_OVER;
  }
}
