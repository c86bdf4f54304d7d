// backend/src/conversion/conversion.module.ts
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FfmpegBridge } from '../bridges/ffmpeg-bridge';
import { ConversionConfig } from '../config/environment';
import { SettingsService } from '../config/settings.service';
import { ApplicationState } from '../state/application-state';
import { ValidationModule } from '../validation/validation.module';
import { ConversionController } from './conversion.controller';
import { ConversionEventsService } from './conversion-events.service';
import {
  CONVERSION_QUEUE_OPTIONS,
  ConversionQueueOptions,
  ConversionQueueService,
} from './conversion-queue.service';
import { FfmpegTranscodingAdapter } from './transcoding/ffmpeg-transcoding.adapter';
import {
  FFMPEG_RUNNER,
  TRANSCODING_ADAPTER,
  TRANSCODING_OPTIONS,
  TranscodingOptions,
} from './transcoding/transcoding.interface';

@Module({
  imports: [ValidationModule],
  controllers: [ConversionController],
  providers: [
    {
      provide: ApplicationState,
      inject: [SettingsService, ConfigService],
      useFactory: (settings: SettingsService, config: ConfigService) =>
        new ApplicationState(
          settings.getSettings(),
          config.getOrThrow<ConversionConfig>('conversion').completedHistorySize,
        ),
    },
    {
      provide: CONVERSION_QUEUE_OPTIONS,
      inject: [ConfigService],
      useFactory: (config: ConfigService): ConversionQueueOptions => {
        const conversion = config.getOrThrow<ConversionConfig>('conversion');
        return {
          maxPendingJobs: conversion.maxPendingJobs,
          maxConcurrentJobsCap: conversion.maxConcurrentJobsCap,
        };
      },
    },
    {
      provide: TRANSCODING_OPTIONS,
      inject: [ConfigService],
      useFactory: (config: ConfigService): TranscodingOptions => {
        const conversion = config.getOrThrow<ConversionConfig>('conversion');
        return {
          progressIntervalMs: conversion.progressIntervalMs,
          killGraceMs: conversion.killGraceMs,
          diskSpaceMarginBytes: conversion.diskSpaceMarginBytes,
        };
      },
    },
    { provide: FFMPEG_RUNNER, useExisting: FfmpegBridge },
    { provide: TRANSCODING_ADAPTER, useClass: FfmpegTranscodingAdapter },
    ConversionEventsService,
    ConversionQueueService,
  ],
  exports: [ConversionQueueService],
})
export class ConversionModule {}
