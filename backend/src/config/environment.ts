// Build configuration from the process environment
import * as os from 'os';
import * as path from 'path';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function getDefaultConfigDir(): string {
  const homeDir = os.homedir();

  if (process.platform === 'darwin') {
    return path.join(homeDir, 'Library', 'Application Support', 'Waveframe');
  } else if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || path.join(homeDir, 'AppData', 'Roaming'), 'Waveframe');
  }
  return path.join(homeDir, '.config', 'waveframe');
}

export interface BinariesConfig {
  ffmpeg?: string;
  ffprobe?: string;
}

export interface ConversionConfig {
  maxPendingJobs: number;
  completedHistorySize: number;
  maxConcurrentJobsCap: number;
  maxFileSizeBytes: number;
  progressIntervalMs: number;
  killGraceMs: number;
  diskSpaceMarginBytes: number;
}

const port = intFromEnv('PORT', 3000);

export const environment = {
  production: process.env.NODE_ENV === 'production',
  port: port,
  apiPrefix: 'api',

  // The desktop shell connects from localhost only
  cors: {
    origins: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization']
  },

  socket: {
    path: '/socket.io',
    credentials: true
  },

  configDir: process.env.WAVEFRAME_CONFIG_DIR || getDefaultConfigDir(),

  binaries: {
    ffmpeg: process.env.FFMPEG_PATH || undefined,
    ffprobe: process.env.FFPROBE_PATH || undefined,
  } satisfies BinariesConfig,

  conversion: {
    maxPendingJobs: intFromEnv('MAX_PENDING_JOBS', 50),
    completedHistorySize: intFromEnv('COMPLETED_HISTORY_SIZE', 20),
    maxConcurrentJobsCap: 5,
    maxFileSizeBytes: 2 * 1024 * 1024 * 1024, // 2 GiB
    progressIntervalMs: intFromEnv('PROGRESS_INTERVAL_MS', 1000),
    killGraceMs: intFromEnv('KILL_GRACE_MS', 5000),
    diskSpaceMarginBytes: 10 * 1024 * 1024,
  } satisfies ConversionConfig,
};

export type Environment = typeof environment;
