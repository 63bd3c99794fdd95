import { v4 as uuidv4 } from 'uuid';
import {
  Ball,
  BattingLine,
  BowlingFigures,
  ExtrasBreakdown,
  FallOfWicket,
  InningsSnapshot,
  InningsStatus,
} from '@crease/shared-types';
import {
  BALLS_PER_OVER,
  BOWLER_CREDITED_DISMISSALS,
  MAX_WICKETS,
  NON_BOWLER_EXTRAS,
} from '@crease/constants';
import {
  InvalidScoreUpdateException,
  ScoringInvariantError,
} from '../common/exceptions/scoring.exceptions';
import { formatOvers, isLegalDelivery, totalRuns } from './ball';

export interface InningsParams {
  inningsNumber: number;
  battingTeamId: string;
  bowlingTeamId: string;
  allottedOvers: number | null;
}

/**
 * Live state of one innings. This is the only place an innings' counters
 * change; every mutation goes through addBall / declare / close.
 */
export class InningsEngine {
  readonly id: string;
  readonly inningsNumber: number;
  readonly battingTeamId: string;
  readonly bowlingTeamId: string;

  private _status: InningsStatus = 'NOT_STARTED';
  private _closed = false;
  private _allottedOvers: number | null;
  private _target: number | null = null;

  private _totalRuns = 0;
  private _wickets = 0;
  private _oversCompleted = 0;
  private _legalBallsInOver = 0;

  private _striker: string | null = null;
  private _nonStriker: string | null = null;
  private _bowler: string | null = null;

  private readonly balls: Ball[] = [];
  private readonly batting = new Map<string, BattingLine>();
  private readonly bowling = new Map<string, BowlingFigures>();
  private readonly fallOfWickets: FallOfWicket[] = [];
  private readonly extras: ExtrasBreakdown = { wides: 0, noBalls: 0, byes: 0, legByes: 0, total: 0 };

  // Runs charged to the bowler in the over being bowled, for maidens
  private overRunsConceded = 0;

  constructor(params: InningsParams) {
    this.id = uuidv4();
    this.inningsNumber = params.inningsNumber;
    this.battingTeamId = params.battingTeamId;
    this.bowlingTeamId = params.bowlingTeamId;
    this._allottedOvers = params.allottedOvers;
  }

  get status(): InningsStatus {
    return this._status;
  }

  get closed(): boolean {
    return this._closed;
  }

  get totalRuns(): number {
    return this._totalRuns;
  }

  get wickets(): number {
    return this._wickets;
  }

  get oversCompleted(): number {
    return this._oversCompleted;
  }

  get legalBallsInOver(): number {
    return this._legalBallsInOver;
  }

  get legalBalls(): number {
    return this._oversCompleted * BALLS_PER_OVER + this._legalBallsInOver;
  }

  get allottedOvers(): number | null {
    return this._allottedOvers;
  }

  /**
   * Legal balls left in the allotment, null when the innings has no overs limit
   */
  get ballsRemaining(): number | null {
    if (this._allottedOvers === null) return null;
    return Math.max(0, this._allottedOvers * BALLS_PER_OVER - this.legalBalls);
  }

  get target(): number | null {
    return this._target;
  }

  get striker(): string | null {
    return this._striker;
  }

  get nonStriker(): string | null {
    return this._nonStriker;
  }

  get bowler(): string | null {
    return this._bowler;
  }

  get runRate(): number {
    const balls = this.legalBalls;
    return balls > 0 ? (this._totalRuns * BALLS_PER_OVER) / balls : 0;
  }

  get ballLog(): readonly Ball[] {
    return this.balls;
  }

  isInProgress(): boolean {
    return this._status === 'IN_PROGRESS';
  }

  start(strikerId: string, nonStrikerId: string, bowlerId?: string | null): void {
    if (this._status !== 'NOT_STARTED') {
      throw new InvalidScoreUpdateException(`Innings ${this.inningsNumber} has already started`);
    }
    if (strikerId === nonStrikerId) {
      throw new InvalidScoreUpdateException('Striker and non-striker must be different players');
    }

    this._striker = strikerId;
    this._nonStriker = nonStrikerId;
    this._bowler = bowlerId ?? null;
    this._status = 'IN_PROGRESS';

    this.battingLine(strikerId);
    this.battingLine(nonStrikerId);
  }

  /**
   * Apply one delivery. Order matters: runs, then wicket, then the over
   * count (end-of-over strike change), then run-based strike change.
   */
  addBall(ball: Ball): void {
    if (this._status !== 'IN_PROGRESS') {
      throw new InvalidScoreUpdateException(
        `Innings ${this.inningsNumber} is not in progress (status: ${this._status})`,
      );
    }
    if (this._wickets >= MAX_WICKETS) {
      throw new InvalidScoreUpdateException(`Innings ${this.inningsNumber} is all out`);
    }
    if (this._striker === null || this._nonStriker === null) {
      throw new InvalidScoreUpdateException('A batting end is empty; send in a new batsman first');
    }
    if (ball.inningsNumber !== this.inningsNumber) {
      throw new InvalidScoreUpdateException(
        `Ball belongs to innings ${ball.inningsNumber}, not innings ${this.inningsNumber}`,
      );
    }

    const legal = isLegalDelivery(ball);

    // 1. Runs
    this._totalRuns += totalRuns(ball);
    this.applyExtras(ball);
    this.applyBatting(ball);
    this.applyBowling(ball, legal);

    // 2. Wicket
    if (ball.isWicket) {
      this.applyWicket(ball, legal);
    }

    // 3. Over count; end-of-over strike change is independent of runs
    if (legal) {
      this._legalBallsInOver++;
      if (this._legalBallsInOver === BALLS_PER_OVER) {
        this._legalBallsInOver = 0;
        this._oversCompleted++;
        this.completeBowlerOver(ball.bowlerId);
        this.rotateStrike();
      }
    }

    // 4. Odd runs change the strike; on a dismissal the new batsman takes the vacated end
    if (!ball.isWicket && ball.runsOffBat % 2 === 1) {
      this.rotateStrike();
    }

    // 5. Log
    this.balls.push(ball);

    this.updateStatus();
    this.assertInvariants();
  }

  /**
   * Force the innings closed by declaration, whatever overs or wickets remain
   */
  declare(): void {
    if (this._status !== 'IN_PROGRESS') {
      throw new InvalidScoreUpdateException(
        `Only an innings in progress can be declared (status: ${this._status})`,
      );
    }
    this._status = 'DECLARED';
  }

  /**
   * Finalize the innings. A terminal status reached on the field is kept;
   * an innings still in progress becomes COMPLETED.
   */
  close(): void {
    if (this._closed) {
      throw new InvalidScoreUpdateException(`Innings ${this.inningsNumber} is already closed`);
    }
    if (this._status === 'NOT_STARTED') {
      throw new InvalidScoreUpdateException(`Innings ${this.inningsNumber} has not started`);
    }
    if (this._status === 'IN_PROGRESS') {
      this._status = 'COMPLETED';
    }
    this._closed = true;
  }

  /**
   * New batsman walks in at the vacated end; with no vacancy, replaces the striker
   */
  sendNewBatsman(playerId: string): void {
    this.assertMutable();
    if (playerId === this._striker || playerId === this._nonStriker) {
      throw new InvalidScoreUpdateException(`Player ${playerId} is already batting`);
    }
    const line = this.batting.get(playerId);
    if (line?.isOut) {
      throw new InvalidScoreUpdateException(`Player ${playerId} has already been dismissed`);
    }

    if (this._striker === null) {
      this._striker = playerId;
    } else if (this._nonStriker === null) {
      this._nonStriker = playerId;
    } else {
      this._striker = playerId;
    }
    this.battingLine(playerId);
  }

  changeBowler(playerId: string): void {
    this.assertMutable();
    this._bowler = playerId;
  }

  setTarget(target: number): void {
    if (!Number.isInteger(target) || target < 1) {
      throw new InvalidScoreUpdateException(`Invalid target: ${target}`);
    }
    this._target = target;
    if (this._status === 'IN_PROGRESS') {
      this.updateStatus();
    }
  }

  /**
   * Reduce the overs allotment (rain). Ends the innings if the new
   * allotment is already used up.
   */
  curtailOvers(overs: number): void {
    this.assertMutable();
    if (this._allottedOvers === null) {
      throw new InvalidScoreUpdateException('Overs cannot be reduced in a format without an overs limit');
    }
    if (!Number.isInteger(overs) || overs < 1 || overs > this._allottedOvers) {
      throw new InvalidScoreUpdateException(
        `Reduced overs must be between 1 and ${this._allottedOvers} (got ${overs})`,
      );
    }
    this._allottedOvers = overs;
    this.updateStatus();
  }

  toSnapshot(): InningsSnapshot {
    return {
      id: this.id,
      inningsNumber: this.inningsNumber,
      battingTeamId: this.battingTeamId,
      bowlingTeamId: this.bowlingTeamId,
      status: this._status,
      closed: this._closed,
      totalRuns: this._totalRuns,
      wickets: this._wickets,
      oversCompleted: this._oversCompleted,
      legalBallsInOver: this._legalBallsInOver,
      allottedOvers: this._allottedOvers,
      target: this._target,
      strikerId: this._striker,
      nonStrikerId: this._nonStriker,
      bowlerId: this._bowler,
      extras: { ...this.extras },
      batting: [...this.batting.values()].map((line) => ({ ...line })),
      bowling: [...this.bowling.values()].map((figures) => ({ ...figures })),
      fallOfWickets: [...this.fallOfWickets],
      balls: [...this.balls],
    };
  }

  private updateStatus(): void {
    if (this._target !== null && this._totalRuns >= this._target) {
      this._status = 'TARGET_ACHIEVED';
    } else if (this._wickets === MAX_WICKETS) {
      this._status = 'ALL_OUT';
    } else if (this._allottedOvers !== null && this._oversCompleted >= this._allottedOvers) {
      this._status = 'COMPLETED';
    }
  }

  private applyExtras(ball: Ball): void {
    switch (ball.extraType) {
      case 'WIDE':
        this.extras.wides += ball.extraRuns;
        break;
      case 'NO_BALL':
        this.extras.noBalls += ball.extraRuns;
        break;
      case 'BYE':
        this.extras.byes += ball.extraRuns;
        break;
      case 'LEG_BYE':
        this.extras.legByes += ball.extraRuns;
        break;
      default:
        break;
    }
    this.extras.total += ball.extraRuns;
  }

  private applyBatting(ball: Ball): void {
    const line = this.battingLine(ball.batsmanId);
    line.runs += ball.runsOffBat;
    if (ball.runsOffBat === 4) line.fours++;
    if (ball.runsOffBat === 6) line.sixes++;
    if (ball.extraType !== 'WIDE' && ball.extraType !== 'DEAD_BALL') {
      line.ballsFaced++;
    }
  }

  private applyBowling(ball: Ball, legal: boolean): void {
    const figures = this.bowlingFigures(ball.bowlerId);
    const charged = NON_BOWLER_EXTRAS.has(ball.extraType) ? ball.runsOffBat : totalRuns(ball);
    figures.runsConceded += charged;
    this.overRunsConceded += charged;
    if (legal) figures.legalBalls++;
  }

  private applyWicket(ball: Ball, legal: boolean): void {
    this._wickets++;

    const dismissedId = ball.dismissedPlayerId ?? ball.batsmanId;
    const line = this.battingLine(dismissedId);
    line.isOut = true;
    line.dismissalType = ball.dismissalType;
    line.bowlerId = ball.bowlerId;
    line.fielderId = ball.fielderId;

    if (ball.dismissalType && BOWLER_CREDITED_DISMISSALS.has(ball.dismissalType)) {
      this.bowlingFigures(ball.bowlerId).wickets++;
    }

    this.fallOfWickets.push({
      wicketNumber: this._wickets,
      teamRuns: this._totalRuns,
      playerId: dismissedId,
      overs: formatOvers(this.legalBalls + (legal ? 1 : 0)),
    });

    if (dismissedId === this._nonStriker) {
      this._nonStriker = null;
    } else {
      this._striker = null;
    }
  }

  private completeBowlerOver(bowlerId: string): void {
    if (this.overRunsConceded === 0) {
      this.bowlingFigures(bowlerId).maidens++;
    }
    this.overRunsConceded = 0;
  }

  private rotateStrike(): void {
    const striker = this._striker;
    this._striker = this._nonStriker;
    this._nonStriker = striker;
  }

  private battingLine(playerId: string): BattingLine {
    let line = this.batting.get(playerId);
    if (!line) {
      line = {
        playerId,
        battingPosition: this.batting.size + 1,
        runs: 0,
        ballsFaced: 0,
        fours: 0,
        sixes: 0,
        isOut: false,
        dismissalType: null,
        bowlerId: null,
        fielderId: null,
      };
      this.batting.set(playerId, line);
    }
    return line;
  }

  private bowlingFigures(playerId: string): BowlingFigures {
    let figures = this.bowling.get(playerId);
    if (!figures) {
      figures = { playerId, legalBalls: 0, maidens: 0, runsConceded: 0, wickets: 0 };
      this.bowling.set(playerId, figures);
    }
    return figures;
  }

  private assertMutable(): void {
    if (this._status !== 'IN_PROGRESS') {
      throw new InvalidScoreUpdateException(
        `Innings ${this.inningsNumber} is not in progress (status: ${this._status})`,
      );
    }
  }

  private assertInvariants(): void {
    if (this._legalBallsInOver < 0 || this._legalBallsInOver >= BALLS_PER_OVER) {
      throw new ScoringInvariantError(`legal balls in over is ${this._legalBallsInOver}`);
    }
    if (this._wickets > MAX_WICKETS) {
      throw new ScoringInvariantError(`wickets is ${this._wickets}`);
    }
    const logged = this.balls.reduce((sum, ball) => sum + totalRuns(ball), 0);
    if (logged !== this._totalRuns) {
      throw new ScoringInvariantError(`total runs ${this._totalRuns} differ from ball log sum ${logged}`);
    }
  }
}
