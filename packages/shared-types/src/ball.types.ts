export type DismissalType =
  | 'BOWLED'
  | 'CAUGHT'
  | 'LBW'
  | 'RUN_OUT'
  | 'STUMPED'
  | 'HIT_WICKET'
  | 'HANDLED_BALL'
  | 'OBSTRUCTING_FIELD'
  | 'TIMED_OUT'
  | 'RETIRED_OUT';

/**
 * How a delivery is classified for the over count and for extras.
 * WIDE, NO_BALL and DEAD_BALL do not count toward the six legal balls of an over.
 */
export type ExtraType = 'LEGAL' | 'WIDE' | 'NO_BALL' | 'BYE' | 'LEG_BYE' | 'DEAD_BALL';

export interface Ball {
  readonly id: string;
  readonly inningsNumber: number;
  /** Completed overs when the ball was bowled (0-based) */
  readonly overNumber: number;
  /** Legal-ball position within the over (1-6); repeats for wides and no-balls */
  readonly ballInOver: number;
  readonly batsmanId: string;
  readonly nonStrikerId: string | null;
  readonly bowlerId: string;
  readonly runsOffBat: number;
  readonly extraType: ExtraType;
  readonly extraRuns: number;
  readonly isWicket: boolean;
  readonly dismissalType: DismissalType | null;
  readonly dismissedPlayerId: string | null;
  readonly fielderId: string | null;
  readonly bowledAt: Date;
}

export interface BallInput {
  inningsNumber: number;
  overNumber: number;
  ballInOver: number;
  batsmanId: string;
  nonStrikerId?: string | null;
  bowlerId: string;
  runsOffBat?: number;
  extraType?: ExtraType;
  extraRuns?: number;
  isWicket?: boolean;
  dismissalType?: DismissalType | null;
  dismissedPlayerId?: string | null;
  fielderId?: string | null;
}

/**
 * A delivery as reported by a scorer; the engine fills in the innings,
 * over position and (when omitted) the current striker and bowler.
 */
export type DeliveryInput = Omit<BallInput, 'inningsNumber' | 'overNumber' | 'ballInOver' | 'batsmanId' | 'bowlerId'> & {
  batsmanId?: string;
  bowlerId?: string;
};

export type CommentaryKind = 'WICKET' | 'BOUNDARY' | 'BALL_BY_BALL';

export interface Commentary {
  readonly id: string;
  readonly matchId: string;
  readonly inningsNumber: number;
  readonly over: string;
  readonly text: string;
  readonly kind: CommentaryKind;
  readonly ballId: string;
  readonly createdAt: Date;
}
