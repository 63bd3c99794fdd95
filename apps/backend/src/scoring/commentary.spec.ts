import { BallInput } from '@crease/shared-types';
import { createBall } from './ball';
import { generateCommentary } from './commentary';

const names: Record<string, string> = {
  ind1: 'Gill',
  ind2: 'Jaiswal',
  aus1: 'Cummins',
};

const resolveName = (id: string) => names[id] ?? id;

function commentaryFor(overrides: Partial<BallInput>) {
  const ball = createBall({
    inningsNumber: 1,
    overNumber: 3,
    ballInOver: 2,
    batsmanId: 'ind1',
    nonStrikerId: 'ind2',
    bowlerId: 'aus1',
    ...overrides,
  });
  return { ball, commentary: generateCommentary('match-1', ball, resolveName) };
}

describe('generateCommentary', () => {
  it('describes a wicket first', () => {
    const { ball, commentary } = commentaryFor({ isWicket: true, dismissalType: 'CAUGHT', fielderId: 'aus5' });

    expect(commentary.text).toBe('Cummins to Gill, OUT! Caught');
    expect(commentary.kind).toBe('WICKET');
    expect(commentary.over).toBe('3.2');
    expect(commentary.ballId).toBe(ball.id);
    expect(commentary.matchId).toBe('match-1');
    expect(commentary.inningsNumber).toBe(1);
  });

  it('names the non-striker when they are the one dismissed', () => {
    const { commentary } = commentaryFor({
      runsOffBat: 1,
      isWicket: true,
      dismissalType: 'RUN_OUT',
      dismissedPlayerId: 'ind2',
    });

    expect(commentary.text).toBe('Cummins to Gill, OUT! Run Out (Jaiswal)');
  });

  it('calls a six', () => {
    const { commentary } = commentaryFor({ runsOffBat: 6 });

    expect(commentary.text).toBe('Cummins to Gill, SIX! 6 runs');
    expect(commentary.kind).toBe('BOUNDARY');
  });

  it('calls a four, even off a no-ball', () => {
    const { commentary } = commentaryFor({ extraType: 'NO_BALL', extraRuns: 1, runsOffBat: 4 });

    expect(commentary.text).toBe('Cummins to Gill, FOUR! 4 runs');
    expect(commentary.kind).toBe('BOUNDARY');
  });

  it('names the extra on an ordinary delivery', () => {
    expect(commentaryFor({ extraType: 'WIDE', extraRuns: 1 }).commentary.text).toBe('Cummins to Gill, wide, 1 run(s)');
    expect(commentaryFor({ extraType: 'LEG_BYE', extraRuns: 2 }).commentary.text).toBe(
      'Cummins to Gill, leg bye, 2 run(s)',
    );
  });

  it('reports a dot ball', () => {
    const { commentary } = commentaryFor({});

    expect(commentary.text).toBe('Cummins to Gill, 0 run(s)');
    expect(commentary.kind).toBe('BALL_BY_BALL');
  });

  it('falls back to the player id for unknown players', () => {
    const { commentary } = commentaryFor({ batsmanId: 'sub1', runsOffBat: 2 });

    expect(commentary.text).toBe('Cummins to sub1, 2 run(s)');
  });
});
