import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  MinLength,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { BattingStyle, FormatCode, PlayerRole } from '@crease/shared-types';
import { BATTING_STYLES, FORMAT_CODES, PLAYER_ROLES, SQUAD_CONSTRAINTS } from '@crease/constants';

export class PlayerDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @MinLength(1)
  @MaxLength(SQUAD_CONSTRAINTS.MAX_NAME_LENGTH)
  name!: string;

  @IsIn(PLAYER_ROLES)
  role!: PlayerRole;

  @IsOptional()
  @IsIn(BATTING_STYLES)
  battingStyle?: BattingStyle;

  @IsOptional()
  @IsString()
  bowlingStyle?: string;
}

export class TeamDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @MinLength(2, { message: 'Team name must be at least 2 characters' })
  @MaxLength(SQUAD_CONSTRAINTS.MAX_TEAM_NAME_LENGTH)
  name!: string;

  @IsOptional()
  @IsString()
  @MaxLength(5)
  shortName?: string;

  @IsArray()
  @ArrayMinSize(SQUAD_CONSTRAINTS.MIN_PLAYERS)
  @ArrayMaxSize(SQUAD_CONSTRAINTS.MAX_PLAYERS)
  @ValidateNested({ each: true })
  @Type(() => PlayerDto)
  players!: PlayerDto[];
}

export class CreateMatchDto {
  @IsOptional()
  @IsString()
  @MaxLength(100)
  title?: string;

  @IsIn(FORMAT_CODES)
  format!: FormatCode;

  @ValidateNested()
  @Type(() => TeamDto)
  team1!: TeamDto;

  @ValidateNested()
  @Type(() => TeamDto)
  team2!: TeamDto;
}
