export * from './format.constants';
export * from './scoring.constants';
export * from './player.constants';
