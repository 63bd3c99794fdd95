import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';

/**
 * A mutating or state-dependent operation was requested while the match
 * is not in the state it needs (e.g. recording a ball before the match starts)
 */
export class InvalidMatchStateException extends ConflictException {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMatchStateException';
  }
}

/**
 * An operation needing an active innings was requested with none active,
 * or the delivery / player change itself is malformed
 */
export class InvalidScoreUpdateException extends BadRequestException {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidScoreUpdateException';
  }
}

export class MatchNotFoundException extends NotFoundException {
  constructor(matchId: string) {
    super(`Match not found: ${matchId}`);
    this.name = 'MatchNotFoundException';
  }
}

/**
 * Engine defect: a counter left its legal range. Never raised by bad input.
 */
export class ScoringInvariantError extends Error {
  constructor(message: string) {
    super(`Scoring invariant violated: ${message}`);
    this.name = 'ScoringInvariantError';
  }
}
