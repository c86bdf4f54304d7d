// backend/src/config/dto/update-settings.dto.ts
import { IsBoolean, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Max, Min } from 'class-validator';
import { VIDEO_QUALITIES, VideoQuality } from '../../conversion/quality-presets';

export const MAX_CONCURRENT_JOBS_CAP = 5;

export class UpdateSettingsDto {
  // null clears the override: outputs go beside their sources
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  outputDirectory?: string | null;

  @IsOptional()
  @IsBoolean()
  preserveMetadata?: boolean;

  @IsOptional()
  @IsIn(VIDEO_QUALITIES, {
    message: `videoQuality must be one of: ${VIDEO_QUALITIES.join(', ')}`
  })
  videoQuality?: VideoQuality;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_CONCURRENT_JOBS_CAP)
  maxConcurrentJobs?: number;
}
