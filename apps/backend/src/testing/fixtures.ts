import { DeliveryInput, FormatCode, MatchFormat, Player, ScoreEventKind, Team } from '@crease/shared-types';
import { getMatchFormat } from '@crease/constants';
import { createSilentLogger } from '../common/logger/logger';
import { ScoreBroadcaster } from '../broadcast/score-broadcaster';
import { ScoreObserver } from '../broadcast/score-observer';
import { MatchState } from '../scoring/match-state';
import { ScoreService } from '../scoring/score.service';
import { ScoringStrategy } from '../scoring/strategies/scoring-strategy';
import { StandardScoringStrategy } from '../scoring/strategies/standard-scoring.strategy';

/**
 * Team whose players are `<id>1`..`<id><size>`, named `<name> 1`..`<name> <size>`
 */
export function makeTeam(id: string, name: string, size = 11): Team {
  return {
    id,
    name,
    shortName: id.toUpperCase(),
    players: Array.from({ length: size }, (_, i): Player => ({
      id: `${id}${i + 1}`,
      name: `${name} ${i + 1}`,
      role: 'ALL-ROUNDER',
      battingStyle: 'RIGHT_HANDED',
      bowlingStyle: null,
    })),
  };
}

/**
 * India (team1, ids ind1..ind11) against Australia (team2, ids aus1..aus11)
 */
export function makeMatch(format: FormatCode | MatchFormat = 'T20', id = 'match-1'): MatchState {
  return new MatchState({
    id,
    team1: makeTeam('ind', 'India'),
    team2: makeTeam('aus', 'Australia'),
    format: typeof format === 'string' ? getMatchFormat(format) : format,
  });
}

export interface RecordedEvent {
  kind: ScoreEventKind;
  matchId: string;
}

/**
 * Observer that remembers the order events arrived in
 */
export class RecordingObserver implements ScoreObserver {
  readonly events: RecordedEvent[] = [];

  onMatchStart(match: MatchState) {
    this.events.push({ kind: 'matchStart', matchId: match.id });
  }

  onBallBowled(match: MatchState) {
    this.events.push({ kind: 'ballBowled', matchId: match.id });
  }

  onWicket(match: MatchState) {
    this.events.push({ kind: 'wicket', matchId: match.id });
  }

  onInningsEnd(match: MatchState) {
    this.events.push({ kind: 'inningsEnd', matchId: match.id });
  }

  onMatchEnd(match: MatchState) {
    this.events.push({ kind: 'matchEnd', matchId: match.id });
  }

  onScoreUpdate(match: MatchState) {
    this.events.push({ kind: 'scoreUpdate', matchId: match.id });
  }

  kinds(): ScoreEventKind[] {
    return this.events.map((event) => event.kind);
  }
}

export interface ScoringHarness {
  service: ScoreService;
  broadcaster: ScoreBroadcaster;
  observer: RecordingObserver;
}

export function createScoringHarness(strategy: ScoringStrategy = new StandardScoringStrategy()): ScoringHarness {
  const logger = createSilentLogger();
  const broadcaster = new ScoreBroadcaster(logger);
  const observer = new RecordingObserver();
  broadcaster.register(observer);
  return { service: new ScoreService(strategy, broadcaster, logger), broadcaster, observer };
}

/**
 * Record one delivery per entry; a number is that many runs off the bat
 */
export function bowl(service: ScoreService, match: MatchState, deliveries: Array<number | DeliveryInput>): void {
  for (const delivery of deliveries) {
    service.recordDelivery(match, typeof delivery === 'number' ? { runsOffBat: delivery } : delivery);
  }
}

export function repeat<T>(value: T, times: number): T[] {
  return Array.from({ length: times }, () => value);
}

/**
 * Bowl the batting side out, sending in the next player of `teamId` after each wicket
 */
export function bowlOut(service: ScoreService, match: MatchState, teamId: string): void {
  let next = 3;
  while (match.activeInnings()) {
    service.recordDelivery(match, { isWicket: true, dismissalType: 'BOWLED' });
    if (match.activeInnings()) {
      service.sendNewBatsman(match, `${teamId}${next}`);
      next++;
    }
  }
}
