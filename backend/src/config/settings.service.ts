// backend/src/config/settings.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import * as fs from 'fs';
import * as path from 'path';
import { ApplicationSettings, DEFAULT_SETTINGS } from '../state/application-state';
import { InternalEvent } from '../common/websocket.types';
import { ConversionError, ErrorCode, errorMessage } from '../common/errors/conversion-error';
import { UpdateSettingsDto } from './dto/update-settings.dto';
import { getDefaultConfigDir } from './environment';

export const SETTINGS_FILENAME = 'settings.json';

interface PersistedSettings extends ApplicationSettings {
  lastUpdated?: string; // ISO string date
}

/**
 * Keep only the fields of a loosely-typed object that pass UpdateSettingsDto validation
 */
function sanitize(raw: unknown): Partial<ApplicationSettings> {
  if (typeof raw !== 'object' || raw === null) {
    return {};
  }

  const dto = plainToInstance(UpdateSettingsDto, raw);
  const invalid = new Set(validateSync(dto).map(e => e.property));

  const result: Partial<ApplicationSettings> = {};
  if (dto.outputDirectory !== undefined && !invalid.has('outputDirectory')) {
    result.outputDirectory = dto.outputDirectory === null ? null : path.resolve(dto.outputDirectory);
  }
  if (dto.preserveMetadata !== undefined && !invalid.has('preserveMetadata')) {
    result.preserveMetadata = dto.preserveMetadata;
  }
  if (dto.videoQuality !== undefined && !invalid.has('videoQuality')) {
    result.videoQuality = dto.videoQuality;
  }
  if (dto.maxConcurrentJobs !== undefined && !invalid.has('maxConcurrentJobs')) {
    result.maxConcurrentJobs = dto.maxConcurrentJobs;
  }
  return result;
}

/**
 * An output folder may not exist yet (the adapter creates it), but if
 * something is already at that path it must be a writable directory.
 */
export function assertUsableOutputDirectory(dir: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(dir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return;
    }
    throw new ConversionError(ErrorCode.PERMISSION_DENIED, `Cannot inspect output directory ${dir}: ${errorMessage(error)}`);
  }

  if (!stats.isDirectory()) {
    throw new ConversionError(ErrorCode.PERMISSION_DENIED, `Output directory is not a directory: ${dir}`);
  }
  try {
    fs.accessSync(dir, fs.constants.W_OK);
  } catch (error) {
    throw new ConversionError(ErrorCode.PERMISSION_DENIED, `Output directory is not writable: ${dir}: ${errorMessage(error)}`);
  }
}

/**
 * Loads and persists user settings as JSON in the config directory
 */
@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);
  private readonly settingsPath: string;
  private settings: ApplicationSettings = { ...DEFAULT_SETTINGS };

  constructor(
    config: ConfigService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    const configDir = config.get<string>('configDir') ?? getDefaultConfigDir();
    this.settingsPath = path.join(configDir, SETTINGS_FILENAME);
    this.load();
  }

  get filePath(): string {
    return this.settingsPath;
  }

  getSettings(): ApplicationSettings {
    return { ...this.settings }; // Return a copy to prevent direct mutation
  }

  /**
   * Merge, persist and broadcast new settings. Returns the full settings.
   * Throws ConversionError when the output directory cannot take files.
   */
  update(changes: UpdateSettingsDto): ApplicationSettings {
    const accepted = sanitize(changes);
    if (accepted.outputDirectory) {
      assertUsableOutputDirectory(accepted.outputDirectory);
    }
    this.settings = { ...this.settings, ...accepted };
    this.save();

    const current = this.getSettings();
    this.eventEmitter.emit(InternalEvent.SETTINGS_UPDATED, current);
    return current;
  }

  reset(): ApplicationSettings {
    this.settings = { ...DEFAULT_SETTINGS };
    this.save();

    const current = this.getSettings();
    this.eventEmitter.emit(InternalEvent.SETTINGS_UPDATED, current);
    return current;
  }

  private load(): void {
    try {
      if (!fs.existsSync(this.settingsPath)) {
        this.logger.log(`No settings file found at ${this.settingsPath}, using defaults`);
        return;
      }

      const raw: unknown = JSON.parse(fs.readFileSync(this.settingsPath, 'utf8'));
      this.settings = { ...DEFAULT_SETTINGS, ...sanitize(raw) };
      this.logger.log(`Settings loaded from ${this.settingsPath}`);
    } catch (error) {
      this.logger.error(`Failed to load settings, using defaults: ${errorMessage(error)}`);
      this.settings = { ...DEFAULT_SETTINGS };
    }
  }

  private save(): boolean {
    try {
      const dir = path.dirname(this.settingsPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      const persisted: PersistedSettings = {
        ...this.settings,
        lastUpdated: new Date().toISOString(),
      };
      fs.writeFileSync(this.settingsPath, JSON.stringify(persisted, null, 2));
      this.logger.log(`Settings saved to ${this.settingsPath}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to save settings: ${errorMessage(error)}`);
      return false;
    }
  }
}
