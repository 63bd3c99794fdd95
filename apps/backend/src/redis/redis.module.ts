import { Module } from '@nestjs/common';
import { LIVE_SCORE_STORE, RedisService } from './redis.service';
import { RedisScoreMirror } from './redis-score-mirror.observer';

@Module({
  providers: [
    RedisService,
    { provide: LIVE_SCORE_STORE, useExisting: RedisService },
    RedisScoreMirror,
  ],
  exports: [RedisService],
})
export class RedisModule {}
