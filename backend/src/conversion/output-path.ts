// Output naming: {stem}_video.mp4 beside the source, or in the override directory

import * as path from 'path';

export const OUTPUT_SUFFIX = '_video';
export const OUTPUT_EXTENSION = '.mp4';

export function deriveOutputPath(inputPath: string, outputDirectory?: string | null): string {
  const parsed = path.parse(path.resolve(inputPath));
  const dir = outputDirectory ? path.resolve(outputDirectory) : parsed.dir;
  return path.join(dir, `${parsed.name}${OUTPUT_SUFFIX}${OUTPUT_EXTENSION}`);
}

function pathKey(filePath: string): string {
  const resolved = path.resolve(filePath);
  // Windows and default macOS volumes are case-insensitive
  return process.platform === 'linux' ? resolved : resolved.toLowerCase();
}

/**
 * Pick a target that no other active job writes to. The first colliding
 * candidate becomes {stem}_video_2.mp4, then _3 and so on. Files already
 * on disk are not considered: those are overwritten.
 */
export function disambiguateOutputPath(candidate: string, takenPaths: Iterable<string>): string {
  const taken = new Set<string>();
  for (const p of takenPaths) {
    taken.add(pathKey(p));
  }

  if (!taken.has(pathKey(candidate))) {
    return candidate;
  }

  const parsed = path.parse(candidate);
  for (let n = 2; ; n++) {
    const next = path.join(parsed.dir, `${parsed.name}_${n}${parsed.ext}`);
    if (!taken.has(pathKey(next))) {
      return next;
    }
  }
}
