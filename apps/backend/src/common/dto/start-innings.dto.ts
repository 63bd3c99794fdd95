import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class StartInningsDto {
  @IsString()
  @IsNotEmpty()
  battingTeamId!: string;

  @IsString()
  @IsNotEmpty()
  bowlingTeamId!: string;

  @IsString()
  @IsNotEmpty()
  strikerId!: string;

  @IsString()
  @IsNotEmpty()
  nonStrikerId!: string;

  @IsOptional()
  @IsString()
  bowlerId?: string;
}
