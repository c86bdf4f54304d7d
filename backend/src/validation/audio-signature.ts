// Magic-byte detection for the audio containers we accept

export type AudioContainer = 'mp3' | 'aac' | 'wav' | 'flac' | 'ogg' | 'mp4';

export const SIGNATURE_BYTES = 12;

export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp3',
  '.wav',
  '.m4a',
  '.aac',
  '.flac',
  '.ogg',
  '.oga',
  '.opus',
]);

function ascii(header: Buffer, offset: number, length: number): string {
  return header.subarray(offset, offset + length).toString('latin1');
}

/**
 * Identify the container from the first bytes of a file, or null when
 * nothing we recognize is there
 */
export function detectAudioSignature(header: Buffer): AudioContainer | null {
  if (header.length >= 3 && ascii(header, 0, 3) === 'ID3') {
    return 'mp3';
  }

  if (header.length >= 12 && ascii(header, 0, 4) === 'RIFF' && ascii(header, 8, 4) === 'WAVE') {
    return 'wav';
  }

  if (header.length >= 4) {
    const magic = ascii(header, 0, 4);
    if (magic === 'fLaC') return 'flac';
    if (magic === 'OggS') return 'ogg';
  }

  if (header.length >= 8 && ascii(header, 4, 4) === 'ftyp') {
    return 'mp4';
  }

  if (header.length >= 2 && header[0] === 0xff && (header[1] & 0xe0) === 0xe0) {
    const layer = (header[1] >> 1) & 0x03;
    // 12-bit sync with layer 00 is an ADTS AAC frame
    if ((header[1] & 0xf0) === 0xf0 && layer === 0) {
      return 'aac';
    }
    // MPEG audio frame: layer 00 is reserved, version 01 is reserved
    const version = (header[1] >> 3) & 0x03;
    if (layer !== 0 && version !== 1) {
      return 'mp3';
    }
  }

  return null;
}
