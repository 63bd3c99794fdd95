import { BallInput } from '@crease/shared-types';
import { InvalidScoreUpdateException } from '../common/exceptions/scoring.exceptions';
import {
  ballNotation,
  createBall,
  formatOvers,
  isFour,
  isLegalDelivery,
  isSix,
  totalRuns,
} from './ball';

const base: BallInput = {
  inningsNumber: 1,
  overNumber: 0,
  ballInOver: 1,
  batsmanId: 'ind1',
  bowlerId: 'aus1',
};

describe('createBall', () => {
  it('fills defaults for a dot ball and freezes it', () => {
    const ball = createBall(base);

    expect(ball.runsOffBat).toBe(0);
    expect(ball.extraType).toBe('LEGAL');
    expect(ball.extraRuns).toBe(0);
    expect(ball.isWicket).toBe(false);
    expect(ball.dismissalType).toBeNull();
    expect(ball.dismissedPlayerId).toBeNull();
    expect(ball.nonStrikerId).toBeNull();
    expect(ball.fielderId).toBeNull();
    expect(Object.isFrozen(ball)).toBe(true);
  });

  it('defaults the dismissed player to the batsman on strike', () => {
    const ball = createBall({ ...base, isWicket: true, dismissalType: 'LBW' });

    expect(ball.dismissedPlayerId).toBe('ind1');
  });

  it('keeps an explicit dismissed player for a run out', () => {
    const ball = createBall({
      ...base,
      nonStrikerId: 'ind2',
      runsOffBat: 1,
      isWicket: true,
      dismissalType: 'RUN_OUT',
      dismissedPlayerId: 'ind2',
      fielderId: 'aus5',
    });

    expect(ball.dismissedPlayerId).toBe('ind2');
    expect(ball.fielderId).toBe('aus5');
  });

  it('accepts runs off the bat on a no-ball', () => {
    const ball = createBall({ ...base, extraType: 'NO_BALL', extraRuns: 1, runsOffBat: 4 });

    expect(totalRuns(ball)).toBe(5);
    expect(isLegalDelivery(ball)).toBe(false);
    expect(isFour(ball)).toBe(true);
  });

  it.each<[string, Partial<BallInput>]>([
    ['negative runs', { runsOffBat: -1 }],
    ['fractional runs', { runsOffBat: 1.5 }],
    ['negative extras', { extraType: 'WIDE', extraRuns: -1 }],
    ['more than seven off the bat', { runsOffBat: 8 }],
    ['bat runs on a wide', { extraType: 'WIDE', extraRuns: 1, runsOffBat: 1 }],
    ['bat runs on a bye', { extraType: 'BYE', extraRuns: 1, runsOffBat: 2 }],
    ['bat runs on a leg bye', { extraType: 'LEG_BYE', extraRuns: 1, runsOffBat: 1 }],
    ['extras on a legal delivery', { extraRuns: 1 }],
    ['a wicket without a dismissal type', { isWicket: true }],
    ['a dismissal type without a wicket', { dismissalType: 'BOWLED' }],
    ['ball position 0', { ballInOver: 0 }],
    ['ball position 7', { ballInOver: 7 }],
    ['a negative over', { overNumber: -1 }],
  ])('rejects %s', (_label, overrides) => {
    expect(() => createBall({ ...base, ...overrides })).toThrow(InvalidScoreUpdateException);
  });
});

describe('delivery helpers', () => {
  it('counts byes and leg byes as legal deliveries', () => {
    expect(isLegalDelivery({ extraType: 'LEGAL' })).toBe(true);
    expect(isLegalDelivery({ extraType: 'BYE' })).toBe(true);
    expect(isLegalDelivery({ extraType: 'LEG_BYE' })).toBe(true);
    expect(isLegalDelivery({ extraType: 'WIDE' })).toBe(false);
    expect(isLegalDelivery({ extraType: 'NO_BALL' })).toBe(false);
    expect(isLegalDelivery({ extraType: 'DEAD_BALL' })).toBe(false);
  });

  it('recognises boundaries by runs off the bat only', () => {
    expect(isSix(createBall({ ...base, runsOffBat: 6 }))).toBe(true);
    expect(isFour(createBall({ ...base, extraType: 'BYE', extraRuns: 4 }))).toBe(false);
  });

  it('formats legal balls as overs notation', () => {
    expect(formatOvers(0)).toBe('0.0');
    expect(formatOvers(5)).toBe('0.5');
    expect(formatOvers(111)).toBe('18.3');
    expect(formatOvers(120)).toBe('20.0');
  });

  it('formats a ball position', () => {
    expect(ballNotation(createBall({ ...base, overNumber: 18, ballInOver: 3 }))).toBe('18.3');
  });
});
