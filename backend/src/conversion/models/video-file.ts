// VideoFile - output of a successful conversion

import { basename } from 'path';
import { AudioFile } from './audio-file';

export class VideoFile {
  readonly filename: string;

  constructor(
    readonly path: string,
    readonly source: AudioFile,
    readonly width: number = 1280,
    readonly height: number = 720,
    readonly fps: number = 30,
    readonly sizeBytes: number = 0,
  ) {
    this.filename = basename(this.path);
  }

  get resolution(): string {
    return `${this.width}x${this.height}`;
  }

  toJSON() {
    return {
      path: this.path,
      filename: this.filename,
      sourcePath: this.source.path,
      width: this.width,
      height: this.height,
      fps: this.fps,
      sizeBytes: this.sizeBytes,
    };
  }
}
