import { IsOptional, IsString, MaxLength } from 'class-validator';

export class ClickQueryDto {
  @IsOptional()
  @IsString()
  @MaxLength(64)
  yclid?: string;

  @IsOptional()
  @IsString()
  @MaxLength(64)
  client_id?: string;

  @IsOptional()
  @IsString()
  @MaxLength(64)
  subid?: string;
}
