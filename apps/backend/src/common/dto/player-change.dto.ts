import { IsNotEmpty, IsString } from 'class-validator';

export class PlayerChangeDto {
  @IsString()
  @IsNotEmpty()
  playerId!: string;
}
