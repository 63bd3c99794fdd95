import { Module } from '@nestjs/common';
import { MatchesController } from './matches.controller';
import { MatchesService } from './matches.service';
import { InMemoryMatchRepository, MATCH_REPOSITORY } from './match.repository';

@Module({
  controllers: [MatchesController],
  providers: [MatchesService, { provide: MATCH_REPOSITORY, useClass: InMemoryMatchRepository }],
  exports: [MatchesService],
})
export class MatchesModule {}
