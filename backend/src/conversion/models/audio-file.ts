// AudioFile - a dropped input, frozen once validation has filled it in

import * as path from 'path';

export type MetadataValue = string | number;

export interface AudioFileProps {
  path: string;
  sizeBytes: number;
  durationSeconds: number;
  sampleRate: number;
  bitrate: number;
  metadata: Record<string, MetadataValue>;
  isValid: boolean;
}

export class AudioFile {
  readonly path: string;
  readonly filename: string;
  readonly sizeBytes: number;
  readonly durationSeconds: number;
  readonly sampleRate: number;
  readonly bitrate: number;
  readonly metadata: Readonly<Record<string, MetadataValue>>;
  readonly isValid: boolean;

  constructor(props: AudioFileProps) {
    this.path = path.resolve(props.path);
    this.filename = path.basename(this.path);
    this.sizeBytes = props.sizeBytes;
    this.durationSeconds = props.durationSeconds;
    this.sampleRate = props.sampleRate;
    this.bitrate = props.bitrate;
    this.metadata = Object.freeze({ ...props.metadata });
    this.isValid = props.isValid;
    Object.freeze(this);
  }

  get stem(): string {
    return path.parse(this.filename).name;
  }

  get extension(): string {
    return path.extname(this.filename).toLowerCase();
  }

  toJSON() {
    return {
      path: this.path,
      filename: this.filename,
      sizeBytes: this.sizeBytes,
      durationSeconds: this.durationSeconds,
      sampleRate: this.sampleRate,
      bitrate: this.bitrate,
      metadata: { ...this.metadata },
      isValid: this.isValid,
    };
  }
}
