import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient } from 'redis';
import winston from 'winston';
import { AppConfig } from '../config/configuration';
import { APP_LOGGER } from '../common/logger/logger';

type RedisClient = ReturnType<typeof createClient>;

export const LIVE_SCORE_STORE = Symbol('LIVE_SCORE_STORE');

/**
 * Where the live score of each match is mirrored for other consumers
 */
export interface LiveScoreStore {
  isEnabled(): boolean;
  writeLiveScore(matchId: string, fields: Record<string, string>): Promise<void>;
  pushCommentary(matchId: string, entry: string, limit: number): Promise<void>;
  writeResult(matchId: string, fields: Record<string, string>): Promise<void>;
}

export const liveScoreKey = (matchId: string) => `match:${matchId}:live`;
export const commentaryKey = (matchId: string) => `match:${matchId}:commentary`;
export const resultKey = (matchId: string) => `match:${matchId}:result`;

@Injectable()
export class RedisService implements LiveScoreStore, OnModuleInit, OnModuleDestroy {
  private client: RedisClient | null = null;
  private readonly config: AppConfig['redis'];

  constructor(
    configService: ConfigService,
    @Inject(APP_LOGGER) private readonly logger: winston.Logger,
  ) {
    this.config = configService.getOrThrow<AppConfig['redis']>('redis');
  }

  async onModuleInit() {
    if (!this.config.enabled) {
      this.logger.info('Redis mirror disabled');
      return;
    }

    const { host, port, password } = this.config;
    this.logger.info('Redis configuration', { host, port, hasPassword: !!password });

    const client = createClient({
      socket: {
        host,
        port,
        reconnectStrategy: (retries) => {
          if (retries > 10) {
            this.logger.error('Redis: too many reconnection attempts');
            return new Error('Too many retries');
          }
          this.logger.warn('Redis reconnecting', { attempt: retries });
          return retries * 100;
        },
      },
      password,
    });

    client.on('error', (err: unknown) =>
      this.logger.error('Redis client error', { error: err instanceof Error ? err.message : String(err) }),
    );
    client.on('ready', () => this.logger.info('Redis ready'));

    await client.connect();
    this.client = client;
  }

  async onModuleDestroy() {
    if (this.client) {
      await this.client.quit();
      this.client = null;
      this.logger.info('Redis disconnected');
    }
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  async writeLiveScore(matchId: string, fields: Record<string, string>): Promise<void> {
    await this.requireClient().hSet(liveScoreKey(matchId), fields);
  }

  /**
   * Newest entry first; the list is trimmed to `limit` entries
   */
  async pushCommentary(matchId: string, entry: string, limit: number): Promise<void> {
    const key = commentaryKey(matchId);
    await this.requireClient().multi().lPush(key, entry).lTrim(key, 0, limit - 1).exec();
  }

  async writeResult(matchId: string, fields: Record<string, string>): Promise<void> {
    await this.requireClient().hSet(resultKey(matchId), fields);
  }

  private requireClient(): RedisClient {
    if (!this.client) {
      throw new Error('Redis client is not connected');
    }
    return this.client;
  }
}
