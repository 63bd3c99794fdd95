import { IsIn, IsNotEmpty, IsString } from 'class-validator';
import { TossDecision } from '@crease/shared-types';
import { TOSS_DECISIONS } from '@crease/constants';

export class TossDto {
  @IsString()
  @IsNotEmpty()
  winnerTeamId!: string;

  @IsIn(TOSS_DECISIONS)
  decision!: TossDecision;
}
