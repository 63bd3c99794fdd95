import { Ball, Commentary } from './ball.types';
import { InningsStatus, LiveScoreSummary, MatchResult } from './match.types';

export type ScoreEventKind =
  | 'matchStart'
  | 'ballBowled'
  | 'wicket'
  | 'inningsEnd'
  | 'matchEnd'
  | 'scoreUpdate';

export interface MatchStartEvent {
  title: string;
  team1Id: string;
  team2Id: string;
}

export interface BallBowledEvent {
  ball: Ball;
  commentary: Commentary;
}

export interface WicketEvent {
  ball: Ball;
  wickets: number;
  liveScore: string;
}

export interface InningsEndEvent {
  inningsNumber: number;
  status: InningsStatus;
  liveScore: string;
}

export interface MatchEndEvent {
  result: MatchResult | null;
  winnerTeamId: string | null;
  description: string | null;
}

export interface ScoreUpdateEvent {
  summary: LiveScoreSummary;
}

export interface ScoreEventPayloads {
  matchStart: MatchStartEvent;
  ballBowled: BallBowledEvent;
  wicket: WicketEvent;
  inningsEnd: InningsEndEvent;
  matchEnd: MatchEndEvent;
  scoreUpdate: ScoreUpdateEvent;
}

/**
 * Socket.io event names, one per broadcast kind
 */
export const SOCKET_EVENT_NAMES: Record<ScoreEventKind, string> = {
  matchStart: 'match_start',
  ballBowled: 'ball_bowled',
  wicket: 'wicket',
  inningsEnd: 'innings_end',
  matchEnd: 'match_end',
  scoreUpdate: 'score_update',
};

export interface SubscribeMatchPayload {
  matchId: string;
}

export interface ErrorEvent {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}
