import { IsBoolean, IsIn, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { DismissalType, ExtraType } from '@crease/shared-types';
import { DISMISSAL_TYPES, EXTRA_TYPES, MAX_RUNS_OFF_BAT } from '@crease/constants';

/**
 * One delivery as entered by the scorer. Striker and bowler default to
 * the players at the crease.
 */
export class RecordDeliveryDto {
  @IsOptional()
  @IsString()
  batsmanId?: string;

  @IsOptional()
  @IsString()
  nonStrikerId?: string;

  @IsOptional()
  @IsString()
  bowlerId?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_RUNS_OFF_BAT)
  runsOffBat?: number;

  @IsOptional()
  @IsIn(EXTRA_TYPES)
  extraType?: ExtraType;

  @IsOptional()
  @IsInt()
  @Min(0)
  extraRuns?: number;

  @IsOptional()
  @IsBoolean()
  isWicket?: boolean;

  @IsOptional()
  @IsIn(DISMISSAL_TYPES)
  dismissalType?: DismissalType;

  @IsOptional()
  @IsString()
  dismissedPlayerId?: string;

  @IsOptional()
  @IsString()
  fielderId?: string;
}
