import { Injectable } from '@nestjs/common';
import { MatchState } from '../scoring/match-state';

export const MATCH_REPOSITORY = Symbol('MATCH_REPOSITORY');

/**
 * Storage for live and finished matches
 */
export interface MatchRepository {
  save(match: MatchState): void;
  findById(matchId: string): MatchState | null;
  findAll(): MatchState[];
  findLive(): MatchState[];
  findCompleted(): MatchState[];
  delete(matchId: string): boolean;
}

/**
 * Process-local registry; matches are lost on restart
 */
@Injectable()
export class InMemoryMatchRepository implements MatchRepository {
  private readonly matches = new Map<string, MatchState>();

  save(match: MatchState): void {
    this.matches.set(match.id, match);
  }

  findById(matchId: string): MatchState | null {
    return this.matches.get(matchId) ?? null;
  }

  findAll(): MatchState[] {
    return [...this.matches.values()];
  }

  findLive(): MatchState[] {
    return this.findAll().filter((match) => match.isLive());
  }

  findCompleted(): MatchState[] {
    return this.findAll().filter((match) => match.isCompleted());
  }

  delete(matchId: string): boolean {
    return this.matches.delete(matchId);
  }
}
