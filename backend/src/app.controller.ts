// backend/src/app.controller.ts
import { Controller, Get } from '@nestjs/common';
import { FfmpegBridge } from './bridges';
import { AppGateway } from './common/app.gateway';
import { ConversionQueueService } from './conversion/conversion-queue.service';

@Controller()
export class AppController {
  constructor(
    private readonly ffmpeg: FfmpegBridge,
    private readonly gateway: AppGateway,
    private readonly queue: ConversionQueueService,
  ) {}

  /**
   * Health check endpoint for the desktop shell
   * GET /api (due to global prefix)
   */
  @Get()
  async getHealth() {
    const ffmpegVersion = await this.ffmpeg.version();
    const { counts } = this.queue.getSnapshot();

    return {
      status: 'ok',
      message: 'Waveframe backend is running',
      ffmpegAvailable: ffmpegVersion !== null,
      ffmpegVersion,
      activeProcesses: this.ffmpeg.getActiveProcesses().length,
      socket: this.gateway.getStatus(),
      jobs: counts,
    };
  }
}
