import { Module } from '@nestjs/common';
import { LiveScoreGateway } from './live-score.gateway';
import { MatchesModule } from '../matches/matches.module';

@Module({
  imports: [MatchesModule],
  providers: [LiveScoreGateway],
  exports: [LiveScoreGateway],
})
export class WebSocketModule {}
