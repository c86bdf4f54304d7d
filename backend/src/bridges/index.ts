/**
 * Bridges - Process wrappers for external binaries
 *
 * Usage:
 *   import { getRuntimePaths, FfmpegBridge, FfprobeBridge } from '../bridges';
 *
 *   const paths = getRuntimePaths();
 *   const ffmpeg = new FfmpegBridge(paths.ffmpeg);
 *   const ffprobe = new FfprobeBridge(paths.ffprobe);
 */

export {
  getRuntimePaths,
  getResourcesPath,
  getPlatformFolder,
  getBinaryExtension,
  type RuntimePaths,
} from './runtime-paths';

export {
  FfmpegBridge,
  parseProgress,
  parseTimestamp,
  DEFAULT_KILL_GRACE_MS,
  type FfmpegProgress,
  type FfmpegProcessInfo,
  type FfmpegResult,
  type FfmpegRunner,
  type FfmpegRunOptions,
} from './ffmpeg-bridge';

export {
  FfprobeBridge,
  summarizeProbe,
  type StreamInfo,
  type FormatInfo,
  type ProbeResult,
  type MediaInfo,
  type MediaProber,
} from './ffprobe-bridge';

export { BridgesModule } from './bridges.module';
