// Video quality tiers - the only shapes of video settings that reach FFmpeg

export const VIDEO_QUALITIES = ['low', 'medium', 'high'] as const;

export type VideoQuality = (typeof VIDEO_QUALITIES)[number];

export interface QualityPreset {
  width: number;
  height: number;
  fps: number;
  crf: number;
  audioBitrate: string;
}

export const QUALITY_PRESETS: Record<VideoQuality, QualityPreset> = {
  low: { width: 854, height: 480, fps: 24, crf: 35, audioBitrate: '128k' },
  medium: { width: 1280, height: 720, fps: 30, crf: 28, audioBitrate: '192k' },
  high: { width: 1920, height: 1080, fps: 30, crf: 23, audioBitrate: '256k' },
};
