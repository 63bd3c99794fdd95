import type { FormatCode, MatchFormat } from '@crease/shared-types';

export const FORMAT_CODES: readonly FormatCode[] = ['T10', 'T20', 'ODI', 'TEST'];

export const MATCH_FORMATS: Record<FormatCode, MatchFormat> = {
  T10: {
    code: 'T10',
    displayName: 'T10',
    oversPerInnings: 10,
    inningsPerSide: 1,
    limitedOvers: true,
  },
  T20: {
    code: 'T20',
    displayName: 'Twenty20',
    oversPerInnings: 20,
    inningsPerSide: 1,
    limitedOvers: true,
  },
  ODI: {
    code: 'ODI',
    displayName: 'One Day International',
    oversPerInnings: 50,
    inningsPerSide: 1,
    limitedOvers: true,
  },
  TEST: {
    code: 'TEST',
    displayName: 'Test Match',
    oversPerInnings: null,
    inningsPerSide: 2,
    limitedOvers: false,
  },
};

export const BALLS_PER_OVER = 6;
export const MAX_WICKETS = 10;
export const MAX_RUNS_OFF_BAT = 7;

export function getMatchFormat(code: FormatCode): MatchFormat {
  return MATCH_FORMATS[code];
}

export function totalInningsFor(format: MatchFormat): number {
  return format.inningsPerSide * 2;
}
