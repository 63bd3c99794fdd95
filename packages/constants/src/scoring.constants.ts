import type { DismissalType, ExtraType } from '@crease/shared-types';
import resourceTable from './dls-resource-table.json';

export interface DlsResourceTable {
  /** Lower bounds of each overs-remaining bucket, highest first */
  oversThresholds: number[];
  /** resources[bucket][wicketsLost], wickets 0-9 */
  resources: number[][];
}

export const DLS_RESOURCE_TABLE: DlsResourceTable = resourceTable;

export type ScoringStrategyName = 'standard' | 'dls';

export const SCORING_STRATEGY_NAMES: readonly ScoringStrategyName[] = ['standard', 'dls'];

export const EXTRA_TYPES: readonly ExtraType[] = ['LEGAL', 'WIDE', 'NO_BALL', 'BYE', 'LEG_BYE', 'DEAD_BALL'];

export const DISMISSAL_TYPES: readonly DismissalType[] = [
  'BOWLED',
  'CAUGHT',
  'LBW',
  'RUN_OUT',
  'STUMPED',
  'HIT_WICKET',
  'HANDLED_BALL',
  'OBSTRUCTING_FIELD',
  'TIMED_OUT',
  'RETIRED_OUT',
];

/** Deliveries that are re-bowled and never advance the over */
export const NON_LEGAL_EXTRAS: ReadonlySet<ExtraType> = new Set<ExtraType>(['WIDE', 'NO_BALL', 'DEAD_BALL']);

/** Extras that are not charged to the bowler's figures */
export const NON_BOWLER_EXTRAS: ReadonlySet<ExtraType> = new Set<ExtraType>(['BYE', 'LEG_BYE']);

export const BOWLER_CREDITED_DISMISSALS: ReadonlySet<DismissalType> = new Set<DismissalType>([
  'BOWLED',
  'CAUGHT',
  'LBW',
  'STUMPED',
  'HIT_WICKET',
]);

export const DISMISSAL_DISPLAY_NAMES: Record<DismissalType, string> = {
  BOWLED: 'Bowled',
  CAUGHT: 'Caught',
  LBW: 'LBW',
  RUN_OUT: 'Run Out',
  STUMPED: 'Stumped',
  HIT_WICKET: 'Hit Wicket',
  HANDLED_BALL: 'Handled the Ball',
  OBSTRUCTING_FIELD: 'Obstructing the Field',
  TIMED_OUT: 'Timed Out',
  RETIRED_OUT: 'Retired Out',
};

export const EXTRA_DISPLAY_NAMES: Record<ExtraType, string> = {
  LEGAL: 'Legal',
  WIDE: 'Wide',
  NO_BALL: 'No Ball',
  BYE: 'Bye',
  LEG_BYE: 'Leg Bye',
  DEAD_BALL: 'Dead Ball',
};

export const COMMENTARY_MIRROR_LIMIT = 50;
