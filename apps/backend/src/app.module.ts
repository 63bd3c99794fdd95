import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration, { validateEnv } from './config/configuration';
import { LoggerModule } from './common/logger/logger.module';
import { BroadcastModule } from './broadcast/broadcast.module';
import { MatchesModule } from './matches/matches.module';
import { ScoringModule } from './scoring/scoring.module';
import { WebSocketModule } from './websocket/websocket.module';
import { RedisModule } from './redis/redis.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [configuration],
      validate: validateEnv,
    }),
    LoggerModule,
    BroadcastModule,
    MatchesModule,
    ScoringModule,
    WebSocketModule,
    RedisModule,
  ],
})
export class AppModule {}
