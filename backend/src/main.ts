import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ValidationPipe } from '@nestjs/common';
import { ExpressAdapter, NestExpressApplication } from '@nestjs/platform-express';
import { environment } from './config/environment';
import { IoAdapter } from '@nestjs/platform-socket.io';
import { Server, ServerOptions } from 'socket.io';
import express from 'express';
import log, { WinstonNestLogger } from './common/logger';

class ExtendedIoAdapter extends IoAdapter {
  createIOServer(port: number, options?: ServerOptions): Server {
    return super.createIOServer(port, {
      ...options,
      path: environment.socket.path,
      cors: {
        origin: environment.cors.origins,
        methods: environment.cors.methods,
        credentials: environment.socket.credentials,
      },
    });
  }
}

const LOCAL_ORIGIN = /^http:\/\/(localhost|127\.0\.0\.1):\d+$/;

async function bootstrap(): Promise<void> {
  log.info('====================================');
  log.info('BACKEND SERVICE STARTING');
  log.info('Process ID:', process.pid);
  log.info('Environment:', process.env.NODE_ENV || 'development');
  log.info('Current directory:', process.cwd());
  log.info('====================================');

  const expressApp = express();

  const app = await NestFactory.create<NestExpressApplication>(
    AppModule,
    new ExpressAdapter(expressApp),
    {
      logger: new WinstonNestLogger(),
      abortOnError: false,
    },
  );

  const port = environment.port;

  // The shell loads from a localhost dev server or from file:// (no origin)
  app.enableCors({
    origin: (origin, callback) => {
      if (!origin || LOCAL_ORIGIN.test(origin)) {
        callback(null, true);
        return;
      }
      callback(new Error('Not allowed by CORS'), false);
    },
    methods: environment.cors.methods.join(','),
    credentials: true,
    allowedHeaders: environment.cors.allowedHeaders.join(', '),
  });

  app.useWebSocketAdapter(new ExtendedIoAdapter(app));

  app.setGlobalPrefix(environment.apiPrefix);

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: false,
    }),
  );

  // Runs onModuleDestroy on SIGINT/SIGTERM so running FFmpeg processes are stopped
  app.enableShutdownHooks();

  await app.listen(port);
  log.info('=== APPLICATION STARTED ===');
  log.info(`Server running on port ${port}`);
  log.info(`API endpoint: http://localhost:${port}/${environment.apiPrefix}`);
}

bootstrap().catch((error: unknown) => {
  log.error('=== BOOTSTRAP ERROR ===');
  log.error('Error during application startup:', error);
  process.exitCode = 1;
});
