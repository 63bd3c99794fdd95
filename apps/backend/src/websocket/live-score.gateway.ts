import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
  WebSocketServer,
} from '@nestjs/websockets';
import { Inject, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { Server, Socket } from 'socket.io';
import winston from 'winston';
import {
  BallBowledEvent,
  ErrorEvent,
  InningsEndEvent,
  MatchEndEvent,
  MatchStartEvent,
  ScoreEventKind,
  ScoreEventPayloads,
  ScoreUpdateEvent,
  SOCKET_EVENT_NAMES,
  SubscribeMatchPayload,
  WicketEvent,
} from '@crease/shared-types';
import { APP_LOGGER } from '../common/logger/logger';
import { MatchNotFoundException } from '../common/exceptions/scoring.exceptions';
import { ScoreBroadcaster } from '../broadcast/score-broadcaster';
import { ScoreObserver } from '../broadcast/score-observer';
import { MatchesService } from '../matches/matches.service';
import { MatchState } from '../scoring/match-state';

// The parts of a socket.io client socket the gateway touches
export type MatchSubscriber = Pick<Socket, 'id' | 'join' | 'leave' | 'emit'>;

export function matchRoom(matchId: string): string {
  return `match:${matchId}`;
}

function toErrorEvent(code: string, error: unknown): ErrorEvent {
  if (error instanceof MatchNotFoundException) {
    return { code: 'MATCH_NOT_FOUND', message: error.message };
  }
  if (error instanceof Error) {
    return { code, message: error.message };
  }
  return { code, message: 'Unexpected error' };
}

/**
 * Relays scoring broadcasts to socket.io clients. Clients join the room of
 * each match they follow with `subscribe_match`.
 */
@WebSocketGateway({
  cors: {
    origin: process.env.CORS_ORIGIN || 'http://localhost:3000',
    credentials: true,
  },
})
export class LiveScoreGateway
  implements ScoreObserver, OnModuleInit, OnModuleDestroy, OnGatewayConnection, OnGatewayDisconnect
{
  readonly observerName = 'LiveScoreGateway';

  @WebSocketServer()
  server!: Server;

  constructor(
    private readonly broadcaster: ScoreBroadcaster,
    private readonly matchesService: MatchesService,
    @Inject(APP_LOGGER) private readonly logger: winston.Logger,
  ) {}

  onModuleInit() {
    this.broadcaster.register(this);
  }

  onModuleDestroy() {
    this.broadcaster.remove(this);
  }

  handleConnection(client: MatchSubscriber) {
    this.logger.debug('Socket connected', { clientId: client.id });
  }

  handleDisconnect(client: MatchSubscriber) {
    this.logger.debug('Socket disconnected', { clientId: client.id });
  }

  /**
   * Client starts following a match; gets the current live score back
   */
  @SubscribeMessage('subscribe_match')
  async handleSubscribeMatch(
    @ConnectedSocket() client: MatchSubscriber,
    @MessageBody() payload: SubscribeMatchPayload,
  ) {
    try {
      if (!payload || typeof payload.matchId !== 'string') {
        client.emit('error', { code: 'INVALID_PAYLOAD', message: 'matchId is required' });
        return;
      }

      const match = this.matchesService.findById(payload.matchId);
      const roomName = matchRoom(match.id);
      await client.join(roomName);

      client.emit('match_subscribed', {
        matchId: match.id,
        roomName,
        liveScore: match.liveScore(),
      });
    } catch (error) {
      client.emit('error', toErrorEvent('SUBSCRIBE_FAILED', error));
    }
  }

  @SubscribeMessage('unsubscribe_match')
  async handleUnsubscribeMatch(
    @ConnectedSocket() client: MatchSubscriber,
    @MessageBody() payload: SubscribeMatchPayload,
  ) {
    if (!payload || typeof payload.matchId !== 'string') {
      client.emit('error', { code: 'INVALID_PAYLOAD', message: 'matchId is required' });
      return;
    }
    await client.leave(matchRoom(payload.matchId));
    client.emit('match_unsubscribed', { matchId: payload.matchId });
  }

  onMatchStart(match: MatchState, event: MatchStartEvent) {
    this.emitToMatch(match, 'matchStart', event);
  }

  onBallBowled(match: MatchState, event: BallBowledEvent) {
    this.emitToMatch(match, 'ballBowled', event);
  }

  onWicket(match: MatchState, event: WicketEvent) {
    this.emitToMatch(match, 'wicket', event);
  }

  onInningsEnd(match: MatchState, event: InningsEndEvent) {
    this.emitToMatch(match, 'inningsEnd', event);
  }

  onMatchEnd(match: MatchState, event: MatchEndEvent) {
    this.emitToMatch(match, 'matchEnd', event);
  }

  onScoreUpdate(match: MatchState, event: ScoreUpdateEvent) {
    this.emitToMatch(match, 'scoreUpdate', event);
  }

  private emitToMatch<K extends ScoreEventKind>(match: MatchState, kind: K, payload: ScoreEventPayloads[K]) {
    // Server is attached once the HTTP adapter starts listening
    if (!this.server) {
      return;
    }
    this.server.to(matchRoom(match.id)).emit(SOCKET_EVENT_NAMES[kind], {
      matchId: match.id,
      ...payload,
    });
  }
}
