import { DismissalType } from './ball.types';

export type PlayerRole = 'BATTER' | 'BOWLER' | 'ALL-ROUNDER' | 'WICKETKEEPER';

export type BattingStyle = 'RIGHT_HANDED' | 'LEFT_HANDED';

export interface Player {
  id: string;
  name: string;
  role: PlayerRole;
  battingStyle: BattingStyle | null;
  bowlingStyle: string | null;
}

/**
 * Per-innings batting line. Runs are runs off the bat only; extras never count.
 */
export interface BattingLine {
  playerId: string;
  battingPosition: number;
  runs: number;
  ballsFaced: number;
  fours: number;
  sixes: number;
  isOut: boolean;
  dismissalType: DismissalType | null;
  bowlerId: string | null;
  fielderId: string | null;
}

export interface BowlingFigures {
  playerId: string;
  legalBalls: number;
  maidens: number;
  runsConceded: number;
  wickets: number;
}
