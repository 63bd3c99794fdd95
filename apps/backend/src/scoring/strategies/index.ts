export * from './scoring-strategy';
export * from './standard-scoring.strategy';
export * from './dls-scoring.strategy';
