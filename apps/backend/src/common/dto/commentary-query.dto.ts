import { IsInt, IsOptional, Min } from 'class-validator';
import { Type } from 'class-transformer';

export class CommentaryQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  limit?: number;
}
