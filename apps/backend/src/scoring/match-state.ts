import { v4 as uuidv4 } from 'uuid';
import {
  Commentary,
  LiveScoreSummary,
  MatchFormat,
  MatchOutcome,
  MatchResult,
  MatchSnapshot,
  MatchStatus,
  Team,
  Toss,
  TossDecision,
} from '@crease/shared-types';
import { MAX_WICKETS, totalInningsFor } from '@crease/constants';
import {
  InvalidMatchStateException,
  InvalidScoreUpdateException,
} from '../common/exceptions/scoring.exceptions';
import { formatOvers } from './ball';
import { InningsEngine } from './innings-engine';

export interface MatchParams {
  id?: string;
  title?: string;
  team1: Team;
  team2: Team;
  format: MatchFormat;
}

export interface OpenInningsParams {
  battingTeamId: string;
  bowlingTeamId: string;
  strikerId: string;
  nonStrikerId: string;
  bowlerId?: string | null;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Match-level state: teams, format, the ordered innings, commentary and result.
 * Innings are only ever appended.
 */
export class MatchState {
  readonly id: string;
  readonly title: string;
  readonly format: MatchFormat;
  readonly team1: Team;
  readonly team2: Team;

  private _status: MatchStatus = 'SCHEDULED';
  private _toss: Toss | null = null;
  private _outcome: MatchOutcome | null = null;
  private _revisedOvers: number | null = null;
  private _startedAt: Date | null = null;
  private _endedAt: Date | null = null;

  private readonly inningsList: InningsEngine[] = [];
  private readonly commentaryLog: Commentary[] = [];

  constructor(params: MatchParams) {
    if (params.team1.id === params.team2.id) {
      throw new InvalidMatchStateException('A match needs two different teams');
    }
    this.id = params.id ?? uuidv4();
    this.team1 = params.team1;
    this.team2 = params.team2;
    this.format = params.format;
    this.title = params.title ?? `${params.team1.name} vs ${params.team2.name}`;
  }

  get status(): MatchStatus {
    return this._status;
  }

  get innings(): readonly InningsEngine[] {
    return this.inningsList;
  }

  /** Latest first */
  get commentary(): readonly Commentary[] {
    return this.commentaryLog;
  }

  get toss(): Toss | null {
    return this._toss;
  }

  get result(): MatchResult | null {
    return this._outcome?.result ?? null;
  }

  get winnerTeamId(): string | null {
    return this._outcome?.winnerTeamId ?? null;
  }

  get resultDescription(): string | null {
    return this._outcome?.description ?? null;
  }

  get startedAt(): Date | null {
    return this._startedAt;
  }

  get endedAt(): Date | null {
    return this._endedAt;
  }

  /**
   * Overs allotted to innings opened from now on (format overs unless reduced)
   */
  get oversPerInnings(): number | null {
    return this._revisedOvers ?? this.format.oversPerInnings;
  }

  isLive(): boolean {
    return this._status === 'LIVE';
  }

  isCompleted(): boolean {
    return this._status === 'COMPLETED';
  }

  start(): void {
    if (this._status !== 'SCHEDULED') {
      throw new InvalidMatchStateException(`Cannot start a match that is ${this._status}`);
    }
    this._status = 'LIVE';
    this._startedAt = new Date();
  }

  setToss(winnerTeamId: string, decision: TossDecision): void {
    if (this.inningsList.length > 0) {
      throw new InvalidMatchStateException('The toss cannot change once play has begun');
    }
    this.assertParticipant(winnerTeamId);
    this._toss = { winnerTeamId, decision };
  }

  openInnings(params: OpenInningsParams): InningsEngine {
    const current = this.currentInnings();
    if (current) {
      throw new InvalidMatchStateException(`Innings ${current.inningsNumber} has not been closed`);
    }
    if (this.inningsList.length >= totalInningsFor(this.format)) {
      throw new InvalidMatchStateException(
        `All ${totalInningsFor(this.format)} innings of this ${this.format.displayName} have been played`,
      );
    }
    this.assertParticipant(params.battingTeamId);
    this.assertParticipant(params.bowlingTeamId);
    if (params.battingTeamId === params.bowlingTeamId) {
      throw new InvalidScoreUpdateException('Batting and bowling teams must be different');
    }

    const innings = new InningsEngine({
      inningsNumber: this.inningsList.length + 1,
      battingTeamId: params.battingTeamId,
      bowlingTeamId: params.bowlingTeamId,
      allottedOvers: this.oversPerInnings,
    });
    innings.start(params.strikerId, params.nonStrikerId, params.bowlerId);
    this.inningsList.push(innings);
    return innings;
  }

  /** The innings currently in progress, if any */
  activeInnings(): InningsEngine | null {
    const latest = this.latestInnings();
    return latest && latest.isInProgress() ? latest : null;
  }

  /** The latest innings that has not been closed yet */
  currentInnings(): InningsEngine | null {
    const latest = this.latestInnings();
    return latest && !latest.closed ? latest : null;
  }

  latestInnings(): InningsEngine | null {
    return this.inningsList.length > 0 ? this.inningsList[this.inningsList.length - 1] : null;
  }

  firstInnings(): InningsEngine | null {
    return this.inningsList[0] ?? null;
  }

  addCommentary(commentary: Commentary): void {
    this.commentaryLog.unshift(commentary);
  }

  reviseOvers(overs: number): void {
    this._revisedOvers = overs;
  }

  /**
   * Runs scored by a team across its innings, optionally excluding one innings
   */
  aggregateFor(teamId: string, exclude?: InningsEngine): number {
    return this.inningsList
      .filter((innings) => innings.battingTeamId === teamId && innings !== exclude)
      .reduce((sum, innings) => sum + innings.totalRuns, 0);
  }

  opponentOf(teamId: string): string {
    return teamId === this.team1.id ? this.team2.id : this.team1.id;
  }

  /**
   * Decide the match once the deciding innings has closed; null while it is still open
   */
  decideResult(): MatchOutcome | null {
    const last = this.latestInnings();
    if (!last || !last.closed) {
      return null;
    }

    if (this.format.inningsPerSide === 2 && last.inningsNumber === 3) {
      return this.decideInningsVictory(last);
    }
    if (last.inningsNumber < totalInningsFor(this.format)) {
      return null;
    }
    return this.decideChase(last);
  }

  complete(outcome: MatchOutcome): void {
    if (this._status !== 'LIVE') {
      throw new InvalidMatchStateException(`Cannot complete a match that is ${this._status}`);
    }
    this._outcome = outcome;
    this._status = 'COMPLETED';
    this._endedAt = new Date();
  }

  /**
   * End the match without a result (weather, bad light, forfeit)
   */
  abandon(description = 'No result'): void {
    if (this._status !== 'LIVE' && this._status !== 'SCHEDULED') {
      throw new InvalidMatchStateException(`Cannot abandon a match that is ${this._status}`);
    }
    const current = this.currentInnings();
    if (current) {
      current.close();
    }
    this._outcome = { result: 'NO_RESULT', winnerTeamId: null, description };
    this._status = 'ABANDONED';
    this._endedAt = new Date();
  }

  teamName(teamId: string): string {
    if (teamId === this.team1.id) return this.team1.name;
    if (teamId === this.team2.id) return this.team2.name;
    return teamId;
  }

  playerName(playerId: string): string {
    const player =
      this.team1.players.find((p) => p.id === playerId) ??
      this.team2.players.find((p) => p.id === playerId);
    return player ? player.name : playerId;
  }

  liveScore(): LiveScoreSummary {
    const innings = this.latestInnings();
    if (!innings) {
      return {
        matchId: this.id,
        matchStatus: this._status,
        inningsNumber: null,
        battingTeamId: null,
        battingTeamName: null,
        runs: 0,
        wickets: 0,
        overs: '0.0',
        runRate: 0,
        target: null,
        runsRequired: null,
        ballsRemaining: null,
        text: 'Match not started',
      };
    }

    const battingTeamName = this.teamName(innings.battingTeamId);
    const overs = formatOvers(innings.legalBalls);
    const runsRequired = innings.target !== null ? Math.max(0, innings.target - innings.totalRuns) : null;
    const ballsRemaining = innings.ballsRemaining;

    let text = `${battingTeamName}: ${innings.totalRuns}/${innings.wickets} (${overs} ov)`;
    if (runsRequired !== null) {
      text += ballsRemaining !== null
        ? ` | Need ${runsRequired} runs from ${ballsRemaining} balls`
        : ` | Need ${runsRequired} runs`;
    }

    return {
      matchId: this.id,
      matchStatus: this._status,
      inningsNumber: innings.inningsNumber,
      battingTeamId: innings.battingTeamId,
      battingTeamName,
      runs: innings.totalRuns,
      wickets: innings.wickets,
      overs,
      runRate: Math.round(innings.runRate * 100) / 100,
      target: innings.target,
      runsRequired,
      ballsRemaining,
      text,
    };
  }

  toSnapshot(): MatchSnapshot {
    return {
      id: this.id,
      title: this.title,
      format: this.format,
      status: this._status,
      team1: this.team1,
      team2: this.team2,
      toss: this._toss,
      innings: this.inningsList.map((innings) => innings.toSnapshot()),
      result: this.result,
      winnerTeamId: this.winnerTeamId,
      resultDescription: this.resultDescription,
      startedAt: this._startedAt,
      endedAt: this._endedAt,
    };
  }

  private decideChase(last: InningsEngine): MatchOutcome {
    const chasing = last.battingTeamId;
    const defending = last.bowlingTeamId;
    const target = last.target ?? this.aggregateFor(defending) - this.aggregateFor(chasing, last) + 1;

    if (last.totalRuns >= target) {
      return {
        result: this.resultFor(chasing),
        winnerTeamId: chasing,
        description: `${this.teamName(chasing)} won by ${plural(MAX_WICKETS - last.wickets, 'wicket')}`,
      };
    }

    if (this.format.limitedOvers || last.status === 'ALL_OUT') {
      const margin = target - 1 - last.totalRuns;
      if (margin === 0) {
        return { result: 'TIE', winnerTeamId: null, description: 'Match tied' };
      }
      return {
        result: this.resultFor(defending),
        winnerTeamId: defending,
        description: `${this.teamName(defending)} won by ${plural(margin, 'run')}`,
      };
    }

    return { result: 'DRAW', winnerTeamId: null, description: 'Match drawn' };
  }

  // Team batting third has batted twice; bowled out still behind loses by an innings
  private decideInningsVictory(third: InningsEngine): MatchOutcome | null {
    if (third.status !== 'ALL_OUT') {
      return null;
    }
    const battedTwice = third.battingTeamId;
    const other = this.opponentOf(battedTwice);
    const deficit = this.aggregateFor(other) - this.aggregateFor(battedTwice);
    if (deficit <= 0) {
      return null;
    }
    return {
      result: this.resultFor(other),
      winnerTeamId: other,
      description: `${this.teamName(other)} won by an innings and ${plural(deficit, 'run')}`,
    };
  }

  private resultFor(teamId: string): MatchResult {
    return teamId === this.team1.id ? 'TEAM1_WIN' : 'TEAM2_WIN';
  }

  private assertParticipant(teamId: string): void {
    if (teamId !== this.team1.id && teamId !== this.team2.id) {
      throw new InvalidScoreUpdateException(`Team ${teamId} is not playing in this match`);
    }
  }
}
