// Conversion Controller - drop files, drive the queue, read its state

import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { ConversionError, ErrorCode } from '../common/errors/conversion-error';
import { toHttpException } from '../common/errors/http-error';
import { ConversionQueueService } from './conversion-queue.service';
import { SubmitFilesDto } from './dto/submit-files.dto';

@Controller('conversions')
export class ConversionController {
  constructor(private readonly queue: ConversionQueueService) {}

  /**
   * Validate and queue dropped files
   * POST /conversions
   * Body: { paths: string[], autoStart?: boolean }
   */
  @Post()
  async submit(@Body() body: SubmitFilesDto) {
    try {
      const result = await this.queue.submitPaths(body.paths, body.autoStart ?? false);

      // Nothing fit: report the whole drop as refused
      const refused =
        result.accepted.length === 0 &&
        result.rejected.length > 0 &&
        result.rejected.every(r => r.errorCode === ErrorCode.QUEUE_CAPACITY_EXCEEDED);
      if (refused) {
        throw new ConversionError(ErrorCode.QUEUE_CAPACITY_EXCEEDED);
      }

      return {
        success: result.rejected.length === 0,
        ...result,
      };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  /**
   * POST /conversions/start
   */
  @Post('start')
  @HttpCode(HttpStatus.OK)
  start() {
    const queued = this.queue.startProcessing();
    return {
      success: true,
      queued,
    };
  }

  /**
   * POST /conversions/cancel-all
   */
  @Post('cancel-all')
  @HttpCode(HttpStatus.OK)
  cancelAll() {
    return {
      success: true,
      ...this.queue.cancelAll(),
    };
  }

  /**
   * POST /conversions/:jobId/cancel
   */
  @Post(':jobId/cancel')
  @HttpCode(HttpStatus.OK)
  cancel(@Param('jobId') jobId: string) {
    const job = this.queue.getJob(jobId);
    if (!job) {
      throw new HttpException(`Job ${jobId} not found`, HttpStatus.NOT_FOUND);
    }
    if (job.isTerminal) {
      throw new HttpException(`Job ${jobId} has already finished (${job.status})`, HttpStatus.CONFLICT);
    }

    this.queue.cancel(jobId);
    return {
      success: true,
      job: job.toJSON(),
    };
  }

  /**
   * GET /conversions
   */
  @Get()
  getState() {
    return {
      success: true,
      state: this.queue.getSnapshot(),
    };
  }

  /**
   * DELETE /conversions/completed
   */
  @Delete('completed')
  clearCompleted() {
    return {
      success: true,
      cleared: this.queue.clearCompleted(),
    };
  }

  /**
   * GET /conversions/:jobId
   */
  @Get(':jobId')
  getJob(@Param('jobId') jobId: string) {
    const job = this.queue.getJob(jobId);
    if (!job) {
      throw new HttpException(`Job ${jobId} not found`, HttpStatus.NOT_FOUND);
    }
    return {
      success: true,
      job: job.toJSON(),
    };
  }
}
