import { bowl, createScoringHarness, makeMatch } from '../testing/fixtures';
import { buildScorecard } from './scorecard';

describe('buildScorecard', () => {
  function scoredMatch() {
    const { service } = createScoringHarness();
    const match = makeMatch();
    match.start();
    service.startInnings(match, 'ind', 'aus', 'ind1', 'ind2', 'aus1');
    return { service, match };
  }

  it('writes each dismissal the way a scorebook does', () => {
    const { service, match } = scoredMatch();

    bowl(service, match, [{ isWicket: true, dismissalType: 'CAUGHT', fielderId: 'aus6' }]);
    service.sendNewBatsman(match, 'ind3');
    bowl(service, match, [{ isWicket: true, dismissalType: 'CAUGHT', fielderId: 'aus1' }]);
    service.sendNewBatsman(match, 'ind4');
    bowl(service, match, [{ isWicket: true, dismissalType: 'STUMPED', fielderId: 'aus7' }]);
    service.sendNewBatsman(match, 'ind5');
    bowl(service, match, [
      { runsOffBat: 1, isWicket: true, dismissalType: 'RUN_OUT', dismissedPlayerId: 'ind2', fielderId: 'aus9' },
    ]);

    const dismissals = buildScorecard(match).innings[0].batting.map((line) => [line.playerId, line.dismissal]);

    expect(dismissals).toEqual([
      ['ind1', 'c Australia 6 b Australia 1'],
      ['ind2', 'run out (Australia 9)'],
      ['ind3', 'c & b Australia 1'],
      ['ind4', 'st Australia 7 b Australia 1'],
      ['ind5', 'not out'],
    ]);
  });

  it('derives strike rate and economy', () => {
    const { service, match } = scoredMatch();

    bowl(service, match, [4, 0, 2, { extraType: 'WIDE', extraRuns: 1 }]);

    const [innings] = buildScorecard(match).innings;
    expect(innings.batting[0]).toMatchObject({ playerId: 'ind1', runs: 6, ballsFaced: 3, strikeRate: 200 });
    expect(innings.bowling[0]).toMatchObject({ overs: '0.3', runsConceded: 7, economy: 14 });
    expect(innings.extras.wides).toBe(1);
    expect(innings.total).toBe('7/0 (0.3 ov)');
  });

  it('lists the fall of wickets', () => {
    const { service, match } = scoredMatch();

    bowl(service, match, [6, { isWicket: true, dismissalType: 'LBW' }]);

    expect(buildScorecard(match).innings[0].fallOfWickets).toEqual([
      { wicketNumber: 1, teamRuns: 6, playerId: 'ind1', overs: '0.2' },
    ]);
  });

  it('has no innings or result before play', () => {
    const scorecard = buildScorecard(makeMatch());

    expect(scorecard).toEqual({
      matchId: 'match-1',
      title: 'India vs Australia',
      innings: [],
      result: null,
      commentaryCount: 0,
    });
  });
});
