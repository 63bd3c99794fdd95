import { IsInt, Min } from 'class-validator';

export class ReduceOversDto {
  @IsInt()
  @Min(1)
  overs!: number;
}
