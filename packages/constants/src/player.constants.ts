import type { BattingStyle, PlayerRole, TossDecision } from '@crease/shared-types';

export const PLAYER_ROLES: readonly PlayerRole[] = ['BATTER', 'BOWLER', 'ALL-ROUNDER', 'WICKETKEEPER'];

export const BATTING_STYLES: readonly BattingStyle[] = ['RIGHT_HANDED', 'LEFT_HANDED'];

export const TOSS_DECISIONS: readonly TossDecision[] = ['BAT', 'BOWL'];

export const SQUAD_CONSTRAINTS = {
  MIN_PLAYERS: 2,
  MAX_PLAYERS: 16,
  MAX_NAME_LENGTH: 60,
  MAX_TEAM_NAME_LENGTH: 50,
} as const;
