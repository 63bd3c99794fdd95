import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import winston from 'winston';
import { Commentary, MatchSnapshot, Scorecard, Team, TossDecision } from '@crease/shared-types';
import { getMatchFormat } from '@crease/constants';
import { APP_LOGGER } from '../common/logger/logger';
import { MatchNotFoundException } from '../common/exceptions/scoring.exceptions';
import { CreateMatchDto, TeamDto } from '../common/dto/create-match.dto';
import { ScoreBroadcaster } from '../broadcast/score-broadcaster';
import { MatchState } from '../scoring/match-state';
import { buildScorecard } from '../scoring/scorecard';
import { MATCH_REPOSITORY, MatchRepository } from './match.repository';

function toTeam(dto: TeamDto): Team {
  return {
    id: dto.id,
    name: dto.name,
    shortName: dto.shortName ?? null,
    players: dto.players.map((player) => ({
      id: player.id,
      name: player.name,
      role: player.role,
      battingStyle: player.battingStyle ?? null,
      bowlingStyle: player.bowlingStyle ?? null,
    })),
  };
}

@Injectable()
export class MatchesService {
  constructor(
    @Inject(MATCH_REPOSITORY) private readonly repository: MatchRepository,
    private readonly broadcaster: ScoreBroadcaster,
    @Inject(APP_LOGGER) private readonly logger: winston.Logger,
  ) {}

  /**
   * Register a match with both squads; it stays SCHEDULED until started
   */
  create(dto: CreateMatchDto): MatchState {
    const match = new MatchState({
      title: dto.title,
      team1: toTeam(dto.team1),
      team2: toTeam(dto.team2),
      format: getMatchFormat(dto.format),
    });
    this.repository.save(match);

    this.logger.info('Match registered', { matchId: match.id, title: match.title, format: match.format.code });
    return match;
  }

  findById(matchId: string): MatchState {
    const match = this.repository.findById(matchId);
    if (!match) {
      throw new MatchNotFoundException(matchId);
    }
    return match;
  }

  findAll(): MatchState[] {
    return this.repository.findAll();
  }

  findLive(): MatchState[] {
    return this.repository.findLive();
  }

  findCompleted(): MatchState[] {
    return this.repository.findCompleted();
  }

  start(matchId: string): MatchState {
    const match = this.findById(matchId);
    match.start();

    this.logger.info('Match started', { matchId: match.id });
    this.broadcaster.notify('matchStart', match, {
      title: match.title,
      team1Id: match.team1.id,
      team2Id: match.team2.id,
    });
    return match;
  }

  setToss(matchId: string, winnerTeamId: string, decision: TossDecision): MatchState {
    const match = this.findById(matchId);
    match.setToss(winnerTeamId, decision);
    return match;
  }

  /**
   * End a match without a result (abandoned)
   */
  end(matchId: string, reason?: string): MatchState {
    const match = this.findById(matchId);
    match.abandon(reason);

    this.logger.info('Match abandoned', { matchId: match.id, reason: match.resultDescription });
    this.broadcaster.notify('matchEnd', match, {
      result: match.result,
      winnerTeamId: match.winnerTeamId,
      description: match.resultDescription,
    });
    return match;
  }

  remove(matchId: string): void {
    if (!this.repository.delete(matchId)) {
      throw new MatchNotFoundException(matchId);
    }
  }

  getSnapshot(matchId: string): MatchSnapshot {
    return this.findById(matchId).toSnapshot();
  }

  getScorecard(matchId: string): Scorecard {
    return buildScorecard(this.findById(matchId));
  }

  /**
   * Newest first; `limit` caps the number of entries
   */
  getCommentary(matchId: string, limit?: number): Commentary[] {
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      throw new BadRequestException(`limit must be a non-negative integer (got ${limit})`);
    }
    const commentary = this.findById(matchId).commentary;
    return limit !== undefined ? commentary.slice(0, limit) : [...commentary];
  }
}
