// backend/src/config/settings.controller.ts
import { Body, Controller, Get, Post, Put } from '@nestjs/common';
import { SettingsService } from './settings.service';
import { UpdateSettingsDto } from './dto/update-settings.dto';
import { toHttpException } from '../common/errors/http-error';

@Controller('settings')
export class SettingsController {
  constructor(private readonly settingsService: SettingsService) {}

  /**
   * GET /settings
   */
  @Get()
  getSettings() {
    return {
      success: true,
      settings: this.settingsService.getSettings(),
    };
  }

  /**
   * PUT /settings
   * Body: any subset of { outputDirectory, preserveMetadata, videoQuality, maxConcurrentJobs }
   */
  @Put()
  updateSettings(@Body() body: UpdateSettingsDto) {
    try {
      return {
        success: true,
        settings: this.settingsService.update(body),
      };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  /**
   * POST /settings/reset
   */
  @Post('reset')
  resetSettings() {
    return {
      success: true,
      settings: this.settingsService.reset(),
    };
  }
}
