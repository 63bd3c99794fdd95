import { Inject, Injectable } from '@nestjs/common';
import winston from 'winston';
import { ScoreEventKind, ScoreEventPayloads } from '@crease/shared-types';
import { APP_LOGGER } from '../common/logger/logger';
import { MatchState } from '../scoring/match-state';
import { DISPATCH, ScoreObserver } from './score-observer';

/**
 * Fans scoring events out to registered observers.
 *
 * Delivery is synchronous, in registration order and best-effort: each
 * notify works on a copy of the observer list taken when it starts, and an
 * observer that throws is logged and skipped.
 */
@Injectable()
export class ScoreBroadcaster {
  private observers: readonly ScoreObserver[] = [];

  constructor(@Inject(APP_LOGGER) private readonly logger: winston.Logger) {}

  register(observer: ScoreObserver): void {
    if (this.observers.includes(observer)) {
      return;
    }
    this.observers = [...this.observers, observer];
  }

  remove(observer: ScoreObserver): void {
    this.observers = this.observers.filter((registered) => registered !== observer);
  }

  notify<K extends ScoreEventKind>(kind: K, match: MatchState, payload: ScoreEventPayloads[K]): void {
    const snapshot = this.observers;
    const deliver = DISPATCH[kind];

    for (const observer of snapshot) {
      try {
        deliver(observer, match, payload);
      } catch (error) {
        this.logger.error('Error notifying observer', {
          event: kind,
          matchId: match.id,
          observer: observer.observerName ?? observer.constructor.name,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  observerCount(): number {
    return this.observers.length;
  }

  clear(): void {
    this.observers = [];
  }
}
