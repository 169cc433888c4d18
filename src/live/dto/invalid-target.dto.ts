import { IsOptional, IsString, MaxLength } from 'class-validator';

/**
 * Body of the report a browser sends when a patch target is gone
 */
export class InvalidTargetDto {
  @IsOptional()
  @IsString()
  @MaxLength(256)
  id?: string;
}
