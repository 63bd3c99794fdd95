import { Player } from './player.types';

export interface Team {
  id: string;
  name: string;
  shortName: string | null;
  players: Player[];
}

export type TossDecision = 'BAT' | 'BOWL';

export interface Toss {
  winnerTeamId: string;
  decision: TossDecision;
}
