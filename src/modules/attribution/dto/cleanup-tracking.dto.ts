import { IsInt, IsOptional, Max, Min } from 'class-validator';

export class CleanupTrackingDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(3650)
  days?: number;
}
