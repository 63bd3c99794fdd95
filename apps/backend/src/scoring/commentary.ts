import { v4 as uuidv4 } from 'uuid';
import { Ball, Commentary, CommentaryKind } from '@crease/shared-types';
import { DISMISSAL_DISPLAY_NAMES, EXTRA_DISPLAY_NAMES } from '@crease/constants';
import { ballNotation, isFour, isSix, totalRuns } from './ball';

export type PlayerNameResolver = (playerId: string) => string;

/**
 * Derive the display line for one delivery.
 * Priority: wicket, six, four, then an ordinary delivery.
 */
export function generateCommentary(
  matchId: string,
  ball: Ball,
  resolveName: PlayerNameResolver,
): Commentary {
  const prefix = `${resolveName(ball.bowlerId)} to ${resolveName(ball.batsmanId)}, `;

  let kind: CommentaryKind;
  let text: string;

  if (ball.isWicket && ball.dismissalType) {
    kind = 'WICKET';
    text = `${prefix}OUT! ${DISMISSAL_DISPLAY_NAMES[ball.dismissalType]}`;
    if (ball.dismissedPlayerId && ball.dismissedPlayerId !== ball.batsmanId) {
      text += ` (${resolveName(ball.dismissedPlayerId)})`;
    }
  } else if (isSix(ball)) {
    kind = 'BOUNDARY';
    text = `${prefix}SIX! ${ball.runsOffBat} runs`;
  } else if (isFour(ball)) {
    kind = 'BOUNDARY';
    text = `${prefix}FOUR! ${ball.runsOffBat} runs`;
  } else {
    kind = 'BALL_BY_BALL';
    const extra = ball.extraType === 'LEGAL' ? '' : `${EXTRA_DISPLAY_NAMES[ball.extraType].toLowerCase()}, `;
    text = `${prefix}${extra}${totalRuns(ball)} run(s)`;
  }

  return Object.freeze({
    id: uuidv4(),
    matchId,
    inningsNumber: ball.inningsNumber,
    over: ballNotation(ball),
    text,
    kind,
    ballId: ball.id,
    createdAt: new Date(),
  });
}
