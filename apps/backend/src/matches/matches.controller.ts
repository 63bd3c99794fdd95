import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { MatchesService } from './matches.service';
import { CreateMatchDto } from '../common/dto/create-match.dto';
import { TossDto } from '../common/dto/toss.dto';
import { EndMatchDto } from '../common/dto/end-match.dto';
import { CommentaryQueryDto } from '../common/dto/commentary-query.dto';

const DEFAULT_COMMENTARY_LIMIT = 20;

@Controller('matches')
export class MatchesController {
  constructor(private readonly matchesService: MatchesService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  createMatch(@Body() createMatchDto: CreateMatchDto) {
    return this.matchesService.create(createMatchDto).toSnapshot();
  }

  @Get()
  listMatches() {
    return this.matchesService.findAll().map((match) => match.toSnapshot());
  }

  @Get('live')
  listLiveMatches() {
    return this.matchesService.findLive().map((match) => match.liveScore());
  }

  @Get(':matchId')
  getMatch(@Param('matchId') matchId: string) {
    return this.matchesService.getSnapshot(matchId);
  }

  @Post(':matchId/start')
  @HttpCode(HttpStatus.OK)
  startMatch(@Param('matchId') matchId: string) {
    return this.matchesService.start(matchId).toSnapshot();
  }

  @Post(':matchId/toss')
  @HttpCode(HttpStatus.OK)
  setToss(@Param('matchId') matchId: string, @Body() tossDto: TossDto) {
    return this.matchesService.setToss(matchId, tossDto.winnerTeamId, tossDto.decision).toSnapshot();
  }

  @Post(':matchId/end')
  @HttpCode(HttpStatus.OK)
  endMatch(@Param('matchId') matchId: string, @Body() endMatchDto: EndMatchDto) {
    return this.matchesService.end(matchId, endMatchDto.reason).toSnapshot();
  }

  @Get(':matchId/scorecard')
  getScorecard(@Param('matchId') matchId: string) {
    return this.matchesService.getScorecard(matchId);
  }

  @Get(':matchId/commentary')
  getCommentary(@Param('matchId') matchId: string, @Query() query: CommentaryQueryDto) {
    return this.matchesService.getCommentary(matchId, query.limit ?? DEFAULT_COMMENTARY_LIMIT);
  }

  @Delete(':matchId')
  @HttpCode(HttpStatus.OK)
  deleteMatch(@Param('matchId') matchId: string) {
    this.matchesService.remove(matchId);
    return { message: 'Match deleted successfully' };
  }
}
