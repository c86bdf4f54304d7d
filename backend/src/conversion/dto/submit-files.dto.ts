// backend/src/conversion/dto/submit-files.dto.ts
import { ArrayMaxSize, IsArray, IsBoolean, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class SubmitFilesDto {
  @IsArray()
  @ArrayMaxSize(500)
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  paths!: string[];

  @IsOptional()
  @IsBoolean()
  autoStart?: boolean;
}
