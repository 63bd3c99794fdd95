import { v4 as uuidv4 } from 'uuid';
import { Ball, BallInput, ExtraType } from '@crease/shared-types';
import { BALLS_PER_OVER, MAX_RUNS_OFF_BAT, NON_LEGAL_EXTRAS } from '@crease/constants';
import { InvalidScoreUpdateException } from '../common/exceptions/scoring.exceptions';

// Deliveries on which the batsman cannot score off the bat
const NO_BAT_RUNS: ReadonlySet<ExtraType> = new Set<ExtraType>(['WIDE', 'BYE', 'LEG_BYE', 'DEAD_BALL']);

function assertRunCount(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidScoreUpdateException(`${label} must be a non-negative integer (got ${value})`);
  }
}

/**
 * Validate a delivery and freeze it. Balls never change after this point.
 */
export function createBall(input: BallInput): Ball {
  const runsOffBat = input.runsOffBat ?? 0;
  const extraRuns = input.extraRuns ?? 0;
  const extraType = input.extraType ?? 'LEGAL';
  const isWicket = input.isWicket ?? false;
  const dismissalType = input.dismissalType ?? null;

  assertRunCount('runsOffBat', runsOffBat);
  assertRunCount('extraRuns', extraRuns);

  if (runsOffBat > MAX_RUNS_OFF_BAT) {
    throw new InvalidScoreUpdateException(`runsOffBat cannot exceed ${MAX_RUNS_OFF_BAT}`);
  }
  if (runsOffBat > 0 && NO_BAT_RUNS.has(extraType)) {
    throw new InvalidScoreUpdateException(`A ${extraType} delivery cannot carry runs off the bat`);
  }
  if (extraType === 'LEGAL' && extraRuns > 0) {
    throw new InvalidScoreUpdateException('A legal delivery cannot carry extra runs');
  }
  if (isWicket && !dismissalType) {
    throw new InvalidScoreUpdateException('A wicket needs a dismissal type');
  }
  if (!isWicket && dismissalType) {
    throw new InvalidScoreUpdateException('A dismissal type was given for a delivery without a wicket');
  }
  if (input.ballInOver < 1 || input.ballInOver > BALLS_PER_OVER || input.overNumber < 0) {
    throw new InvalidScoreUpdateException(`Invalid ball position ${input.overNumber}.${input.ballInOver}`);
  }

  return Object.freeze({
    id: uuidv4(),
    inningsNumber: input.inningsNumber,
    overNumber: input.overNumber,
    ballInOver: input.ballInOver,
    batsmanId: input.batsmanId,
    nonStrikerId: input.nonStrikerId ?? null,
    bowlerId: input.bowlerId,
    runsOffBat,
    extraType,
    extraRuns,
    isWicket,
    dismissalType: isWicket ? dismissalType : null,
    dismissedPlayerId: isWicket ? input.dismissedPlayerId ?? input.batsmanId : null,
    fielderId: input.fielderId ?? null,
    bowledAt: new Date(),
  });
}

export function isLegalDelivery(ball: Pick<Ball, 'extraType'>): boolean {
  return !NON_LEGAL_EXTRAS.has(ball.extraType);
}

export function totalRuns(ball: Pick<Ball, 'runsOffBat' | 'extraRuns'>): number {
  return ball.runsOffBat + ball.extraRuns;
}

export function isFour(ball: Ball): boolean {
  return ball.runsOffBat === 4;
}

export function isSix(ball: Ball): boolean {
  return ball.runsOffBat === 6;
}

/**
 * Cricket overs notation: 111 legal balls -> "18.3"
 */
export function formatOvers(legalBalls: number): string {
  return `${Math.floor(legalBalls / BALLS_PER_OVER)}.${legalBalls % BALLS_PER_OVER}`;
}

export function ballNotation(ball: Ball): string {
  return `${ball.overNumber}.${ball.ballInOver}`;
}
