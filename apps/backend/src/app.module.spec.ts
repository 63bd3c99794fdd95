import { Test, TestingModule } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { buildConfig } from './config/configuration';
import { APP_LOGGER, createSilentLogger } from './common/logger/logger';
import { LoggerModule } from './common/logger/logger.module';
import { BroadcastModule } from './broadcast/broadcast.module';
import { ScoreBroadcaster } from './broadcast/score-broadcaster';
import { MatchesController } from './matches/matches.controller';
import { MatchesModule } from './matches/matches.module';
import { ScoringController } from './scoring/scoring.controller';
import { ScoringModule } from './scoring/scoring.module';
import { WebSocketModule } from './websocket/websocket.module';
import { RedisModule } from './redis/redis.module';
import { createMatchDto } from './testing/match-dto';

describe('AppModule wiring', () => {
  let moduleRef: TestingModule;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => buildConfig({ SCORING_STRATEGY: 'dls' })],
        }),
        LoggerModule,
        BroadcastModule,
        MatchesModule,
        ScoringModule,
        WebSocketModule,
        RedisModule,
      ],
    })
      .overrideProvider(APP_LOGGER)
      .useValue(createSilentLogger())
      .compile();
    await moduleRef.init();
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('registers the gateway but not the disabled redis mirror', () => {
    expect(moduleRef.get(ScoreBroadcaster).observerCount()).toBe(1);
  });

  it('scores a match through the controllers with the configured strategy', () => {
    const matches = moduleRef.get(MatchesController);
    const scoring = moduleRef.get(ScoringController);

    const { id } = matches.createMatch(createMatchDto());
    matches.startMatch(id);
    scoring.startInnings(id, {
      battingTeamId: 'ind',
      bowlingTeamId: 'aus',
      strikerId: 'ind1',
      nonStrikerId: 'ind2',
      bowlerId: 'aus1',
    });

    expect(scoring.getStats(id)).toEqual({
      strategy: 'dls',
      requiredRunRate: 0,
      projectedScore: 0,
      winProbability: 0.5,
    });

    const { commentary, liveScore } = scoring.recordBall(id, { runsOffBat: 4 });

    expect(commentary.text).toBe('Australia 1 to India 1, FOUR! 4 runs');
    expect(liveScore.text).toBe('India: 4/0 (0.1 ov)');
    expect(matches.listLiveMatches()).toHaveLength(1);
    expect(matches.getCommentary(id, {})).toHaveLength(1);
  });
});
