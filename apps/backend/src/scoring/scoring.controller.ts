import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { MatchesService } from '../matches/matches.service';
import { StartInningsDto } from '../common/dto/start-innings.dto';
import { RecordDeliveryDto } from '../common/dto/record-delivery.dto';
import { PlayerChangeDto } from '../common/dto/player-change.dto';
import { ReduceOversDto } from '../common/dto/reduce-overs.dto';
import { ScoreService } from './score.service';

// Infinity does not survive JSON
function toRate(value: number): number | null {
  return Number.isFinite(value) ? Math.round(value * 100) / 100 : null;
}

@Controller('matches/:matchId')
export class ScoringController {
  constructor(
    private readonly matchesService: MatchesService,
    private readonly scoreService: ScoreService,
  ) {}

  @Post('innings')
  @HttpCode(HttpStatus.CREATED)
  startInnings(@Param('matchId') matchId: string, @Body() dto: StartInningsDto) {
    const match = this.matchesService.findById(matchId);
    const innings = this.scoreService.startInnings(
      match,
      dto.battingTeamId,
      dto.bowlingTeamId,
      dto.strikerId,
      dto.nonStrikerId,
      dto.bowlerId,
    );
    return innings.toSnapshot();
  }

  @Post('balls')
  @HttpCode(HttpStatus.CREATED)
  recordBall(@Param('matchId') matchId: string, @Body() dto: RecordDeliveryDto) {
    const match = this.matchesService.findById(matchId);
    const commentary = this.scoreService.recordDelivery(match, dto);
    return { commentary, liveScore: this.scoreService.getLiveScore(match) };
  }

  @Post('batsman')
  @HttpCode(HttpStatus.OK)
  sendNewBatsman(@Param('matchId') matchId: string, @Body() dto: PlayerChangeDto) {
    const match = this.matchesService.findById(matchId);
    this.scoreService.sendNewBatsman(match, dto.playerId);
    return this.scoreService.getLiveScore(match);
  }

  @Post('bowler')
  @HttpCode(HttpStatus.OK)
  changeBowler(@Param('matchId') matchId: string, @Body() dto: PlayerChangeDto) {
    const match = this.matchesService.findById(matchId);
    this.scoreService.changeBowler(match, dto.playerId);
    return this.scoreService.getLiveScore(match);
  }

  @Post('innings/end')
  @HttpCode(HttpStatus.OK)
  endInnings(@Param('matchId') matchId: string) {
    const match = this.matchesService.findById(matchId);
    const outcome = this.scoreService.endInnings(match);
    return { outcome, liveScore: this.scoreService.getLiveScore(match) };
  }

  @Post('innings/declare')
  @HttpCode(HttpStatus.OK)
  declareInnings(@Param('matchId') matchId: string) {
    const match = this.matchesService.findById(matchId);
    const outcome = this.scoreService.declareInnings(match);
    return { outcome, liveScore: this.scoreService.getLiveScore(match) };
  }

  @Post('overs')
  @HttpCode(HttpStatus.OK)
  reduceOvers(@Param('matchId') matchId: string, @Body() dto: ReduceOversDto) {
    const match = this.matchesService.findById(matchId);
    this.scoreService.reduceOvers(match, dto.overs);
    return this.scoreService.getLiveScore(match);
  }

  @Get('live')
  getLiveScore(@Param('matchId') matchId: string) {
    return this.scoreService.getLiveScore(this.matchesService.findById(matchId));
  }

  @Get('stats')
  getStats(@Param('matchId') matchId: string) {
    const match = this.matchesService.findById(matchId);
    return {
      strategy: this.scoreService.strategyName,
      requiredRunRate: toRate(this.scoreService.getRequiredRunRate(match)),
      projectedScore: this.scoreService.getProjectedScore(match),
      winProbability: toRate(this.scoreService.getWinProbability(match)),
    };
  }
}
