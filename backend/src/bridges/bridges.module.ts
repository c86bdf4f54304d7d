// backend/src/bridges/bridges.module.ts
import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FfmpegBridge } from './ffmpeg-bridge';
import { FfprobeBridge } from './ffprobe-bridge';
import { getRuntimePaths, RuntimePaths } from './runtime-paths';
import { BinariesConfig } from '../config/environment';

export const RUNTIME_PATHS = Symbol('RUNTIME_PATHS');

/**
 * Bridges Module - Provides binary bridges globally.
 * Each bridge is a single instance so its process registry sees every job.
 */
@Global()
@Module({
  providers: [
    {
      provide: RUNTIME_PATHS,
      inject: [ConfigService],
      useFactory: (config: ConfigService): RuntimePaths =>
        getRuntimePaths(config.get<BinariesConfig>('binaries') ?? {}),
    },
    {
      provide: FfmpegBridge,
      inject: [RUNTIME_PATHS],
      useFactory: (paths: RuntimePaths) => new FfmpegBridge(paths.ffmpeg),
    },
    {
      provide: FfprobeBridge,
      inject: [RUNTIME_PATHS],
      useFactory: (paths: RuntimePaths) => new FfprobeBridge(paths.ffprobe),
    },
  ],
  exports: [FfmpegBridge, FfprobeBridge],
})
export class BridgesModule {}
