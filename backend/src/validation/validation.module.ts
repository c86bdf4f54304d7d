// backend/src/validation/validation.module.ts
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FfprobeBridge } from '../bridges/ffprobe-bridge';
import { ConversionConfig } from '../config/environment';
import { FileValidatorService } from './file-validator.service';
import { FILE_VALIDATOR_OPTIONS, FileValidatorOptions, MEDIA_PROBER } from './validation.interface';

@Module({
  providers: [
    { provide: MEDIA_PROBER, useExisting: FfprobeBridge },
    {
      provide: FILE_VALIDATOR_OPTIONS,
      inject: [ConfigService],
      useFactory: (config: ConfigService): FileValidatorOptions => ({
        maxFileSizeBytes: config.getOrThrow<ConversionConfig>('conversion').maxFileSizeBytes,
      }),
    },
    FileValidatorService,
  ],
  exports: [FileValidatorService],
})
export class ValidationModule {}
