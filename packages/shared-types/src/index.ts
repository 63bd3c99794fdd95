export * from './ball.types';
export * from './player.types';
export * from './team.types';
export * from './match.types';
export * from './score-event.types';
