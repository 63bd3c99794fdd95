import {
  BallBowledEvent,
  InningsEndEvent,
  MatchEndEvent,
  MatchStartEvent,
  ScoreEventKind,
  ScoreEventPayloads,
  ScoreUpdateEvent,
  WicketEvent,
} from '@crease/shared-types';
import { MatchState } from '../scoring/match-state';

/**
 * Consumer of live scoring events. Implement only the callbacks you need;
 * callbacks run synchronously inside the scoring command, so anything slow
 * should be started and left to finish on its own.
 */
export interface ScoreObserver {
  /** Used in log lines when the observer fails */
  readonly observerName?: string;

  onMatchStart?(match: MatchState, event: MatchStartEvent): void;
  onBallBowled?(match: MatchState, event: BallBowledEvent): void;
  onWicket?(match: MatchState, event: WicketEvent): void;
  onInningsEnd?(match: MatchState, event: InningsEndEvent): void;
  onMatchEnd?(match: MatchState, event: MatchEndEvent): void;
  onScoreUpdate?(match: MatchState, event: ScoreUpdateEvent): void;
}

type Dispatchers = {
  [K in ScoreEventKind]: (observer: ScoreObserver, match: MatchState, payload: ScoreEventPayloads[K]) => void;
};

export const DISPATCH: Dispatchers = {
  matchStart: (observer, match, payload) => observer.onMatchStart?.(match, payload),
  ballBowled: (observer, match, payload) => observer.onBallBowled?.(match, payload),
  wicket: (observer, match, payload) => observer.onWicket?.(match, payload),
  inningsEnd: (observer, match, payload) => observer.onInningsEnd?.(match, payload),
  matchEnd: (observer, match, payload) => observer.onMatchEnd?.(match, payload),
  scoreUpdate: (observer, match, payload) => observer.onScoreUpdate?.(match, payload),
};
