import { BattingLine, InningsScorecard, Scorecard } from '@crease/shared-types';
import { BALLS_PER_OVER } from '@crease/constants';
import { formatOvers } from './ball';
import { InningsEngine } from './innings-engine';
import { MatchState } from './match-state';

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function dismissalText(line: BattingLine, name: (id: string) => string): string {
  if (!line.isOut || !line.dismissalType) {
    return 'not out';
  }
  const bowler = line.bowlerId ? name(line.bowlerId) : '';
  const fielder = line.fielderId ? name(line.fielderId) : '';

  switch (line.dismissalType) {
    case 'BOWLED':
      return `b ${bowler}`;
    case 'CAUGHT':
      return fielder && fielder !== bowler ? `c ${fielder} b ${bowler}` : `c & b ${bowler}`;
    case 'LBW':
      return `lbw b ${bowler}`;
    case 'RUN_OUT':
      return fielder ? `run out (${fielder})` : 'run out';
    case 'STUMPED':
      return `st ${fielder} b ${bowler}`;
    case 'HIT_WICKET':
      return `hit wicket b ${bowler}`;
    case 'HANDLED_BALL':
      return 'handled the ball';
    case 'OBSTRUCTING_FIELD':
      return 'obstructing the field';
    case 'TIMED_OUT':
      return 'timed out';
    case 'RETIRED_OUT':
      return 'retired out';
  }
}

function inningsScorecard(match: MatchState, innings: InningsEngine): InningsScorecard {
  const snapshot = innings.toSnapshot();
  const name = (id: string) => match.playerName(id);

  return {
    inningsNumber: snapshot.inningsNumber,
    battingTeamName: match.teamName(snapshot.battingTeamId),
    total: `${snapshot.totalRuns}/${snapshot.wickets} (${formatOvers(innings.legalBalls)} ov)`,
    extras: snapshot.extras,
    batting: snapshot.batting.map((line) => ({
      ...line,
      playerName: name(line.playerId),
      dismissal: dismissalText(line, name),
      strikeRate: line.ballsFaced > 0 ? round2((line.runs * 100) / line.ballsFaced) : 0,
    })),
    bowling: snapshot.bowling.map((figures) => ({
      ...figures,
      playerName: name(figures.playerId),
      overs: formatOvers(figures.legalBalls),
      economy: figures.legalBalls > 0 ? round2((figures.runsConceded * BALLS_PER_OVER) / figures.legalBalls) : 0,
    })),
    fallOfWickets: snapshot.fallOfWickets,
  };
}

/**
 * Full scorecard: batting, bowling, extras and fall of wickets per innings
 */
export function buildScorecard(match: MatchState): Scorecard {
  return {
    matchId: match.id,
    title: match.title,
    innings: match.innings.map((innings) => inningsScorecard(match, innings)),
    result: match.resultDescription,
    commentaryCount: match.commentary.length,
  };
}
