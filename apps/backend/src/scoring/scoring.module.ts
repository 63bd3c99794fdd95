import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ScoringStrategyName } from '@crease/constants';
import { MatchesModule } from '../matches/matches.module';
import { ScoreService } from './score.service';
import { ScoringController } from './scoring.controller';
import {
  DLSScoringStrategy,
  SCORING_STRATEGY,
  ScoringStrategy,
  StandardScoringStrategy,
} from './strategies';

export function createScoringStrategy(name: ScoringStrategyName): ScoringStrategy {
  switch (name) {
    case 'dls':
      return new DLSScoringStrategy();
    case 'standard':
      return new StandardScoringStrategy();
  }
}

@Module({
  imports: [MatchesModule],
  controllers: [ScoringController],
  providers: [
    ScoreService,
    {
      provide: SCORING_STRATEGY,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        createScoringStrategy(configService.getOrThrow<ScoringStrategyName>('scoring.strategy')),
    },
  ],
  exports: [ScoreService],
})
export class ScoringModule {}
