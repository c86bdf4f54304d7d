/**
 * Runtime path resolution for the FFmpeg and FFprobe binaries
 */

import * as path from 'path';
import * as fs from 'fs';
import { Logger } from '@nestjs/common';

const logger = new Logger('RuntimePaths');

export interface RuntimePaths {
  ffmpeg: string;
  ffprobe: string;
}

/**
 * Get the base resources directory.
 * WAVEFRAME_RESOURCES_PATH is set by the desktop shell in packaged builds.
 */
export function getResourcesPath(): string {
  if (process.env.WAVEFRAME_RESOURCES_PATH) {
    return process.env.WAVEFRAME_RESOURCES_PATH;
  }

  // Backend runs from backend/ subdir, go up one level for project root
  const cwd = process.cwd();
  if (path.basename(cwd) === 'backend') {
    return path.dirname(cwd);
  }

  return cwd;
}

/**
 * Get platform folder for bundled binaries
 */
export function getPlatformFolder(): string {
  const platform = process.platform;
  const arch = process.arch;

  if (platform === 'win32') {
    return 'win32-x64';
  } else if (platform === 'darwin') {
    return arch === 'arm64' ? 'darwin-arm64' : 'darwin-x64';
  }
  return arch === 'arm64' ? 'linux-arm64' : 'linux-x64';
}

export function getBinaryExtension(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

function resolveBinary(name: string, override: string | undefined, resourcesPath: string): string {
  if (override) {
    return override;
  }

  const bundled = path.join(resourcesPath, 'bin', getPlatformFolder(), `${name}${getBinaryExtension()}`);
  if (fs.existsSync(bundled)) {
    return bundled;
  }

  // Fall back to whatever is on PATH
  return `${name}${getBinaryExtension()}`;
}

/**
 * Resolve binary paths: explicit configuration, then a bundled copy, then PATH
 */
export function getRuntimePaths(overrides: Partial<RuntimePaths> = {}): RuntimePaths {
  const resourcesPath = getResourcesPath();

  const paths: RuntimePaths = {
    ffmpeg: resolveBinary('ffmpeg', overrides.ffmpeg, resourcesPath),
    ffprobe: resolveBinary('ffprobe', overrides.ffprobe, resourcesPath),
  };

  logger.log(`Using ffmpeg=${paths.ffmpeg} ffprobe=${paths.ffprobe}`);
  return paths;
}
