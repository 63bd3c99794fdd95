import { Global, Module } from '@nestjs/common';
import { ScoreBroadcaster } from './score-broadcaster';

@Global()
@Module({
  providers: [ScoreBroadcaster],
  exports: [ScoreBroadcaster],
})
export class BroadcastModule {}
