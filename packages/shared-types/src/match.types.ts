import { Ball } from './ball.types';
import { BattingLine, BowlingFigures } from './player.types';
import { Team, Toss } from './team.types';

export type FormatCode = 'T10' | 'T20' | 'ODI' | 'TEST';

export interface MatchFormat {
  code: FormatCode;
  displayName: string;
  /** null for formats without an overs limit */
  oversPerInnings: number | null;
  inningsPerSide: 1 | 2;
  limitedOvers: boolean;
}

export type MatchStatus = 'SCHEDULED' | 'LIVE' | 'COMPLETED' | 'ABANDONED';

export type MatchResult = 'TEAM1_WIN' | 'TEAM2_WIN' | 'TIE' | 'DRAW' | 'NO_RESULT';

export type InningsStatus =
  | 'NOT_STARTED'
  | 'IN_PROGRESS'
  | 'ALL_OUT'
  | 'DECLARED'
  | 'TARGET_ACHIEVED'
  | 'COMPLETED';

export interface ExtrasBreakdown {
  wides: number;
  noBalls: number;
  byes: number;
  legByes: number;
  total: number;
}

export interface FallOfWicket {
  wicketNumber: number;
  teamRuns: number;
  playerId: string;
  overs: string;
}

export interface InningsSnapshot {
  id: string;
  inningsNumber: number;
  battingTeamId: string;
  bowlingTeamId: string;
  status: InningsStatus;
  closed: boolean;
  totalRuns: number;
  wickets: number;
  oversCompleted: number;
  legalBallsInOver: number;
  allottedOvers: number | null;
  target: number | null;
  strikerId: string | null;
  nonStrikerId: string | null;
  bowlerId: string | null;
  extras: ExtrasBreakdown;
  batting: BattingLine[];
  bowling: BowlingFigures[];
  fallOfWickets: FallOfWicket[];
  balls: Ball[];
}

export interface LiveScoreSummary {
  matchId: string;
  matchStatus: MatchStatus;
  inningsNumber: number | null;
  battingTeamId: string | null;
  battingTeamName: string | null;
  runs: number;
  wickets: number;
  overs: string;
  runRate: number;
  target: number | null;
  runsRequired: number | null;
  ballsRemaining: number | null;
  text: string;
}

export interface MatchOutcome {
  result: MatchResult;
  winnerTeamId: string | null;
  description: string;
}

export interface MatchSnapshot {
  id: string;
  title: string;
  format: MatchFormat;
  status: MatchStatus;
  team1: Team;
  team2: Team;
  toss: Toss | null;
  innings: InningsSnapshot[];
  result: MatchResult | null;
  winnerTeamId: string | null;
  resultDescription: string | null;
  startedAt: Date | null;
  endedAt: Date | null;
}

export interface InningsScorecard {
  inningsNumber: number;
  battingTeamName: string;
  total: string;
  extras: ExtrasBreakdown;
  batting: Array<BattingLine & { playerName: string; dismissal: string; strikeRate: number }>;
  bowling: Array<BowlingFigures & { playerName: string; overs: string; economy: number }>;
  fallOfWickets: FallOfWicket[];
}

export interface Scorecard {
  matchId: string;
  title: string;
  innings: InningsScorecard[];
  result: string | null;
  commentaryCount: number;
}
