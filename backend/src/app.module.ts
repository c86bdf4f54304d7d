// backend/src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { AppController } from './app.controller';
import { BridgesModule } from './bridges';
import { CommonModule } from './common/common.module';
import { environment } from './config/environment';
import { SettingsModule } from './config/settings.module';
import { ConversionModule } from './conversion/conversion.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [() => environment],
    }),
    EventEmitterModule.forRoot({
      global: true,
    }),
    CommonModule,
    BridgesModule,
    SettingsModule,
    ConversionModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
