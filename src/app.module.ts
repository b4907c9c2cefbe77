import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';

import appConfig from './config/app.config';
import ollamaConfig from './config/ollama.config';
import cleansingConfig from './config/cleansing.config';

import { OllamaModule } from './modules/ollama/ollama.module';
import { CleansingModule } from './modules/cleansing/cleansing.module';
import { HealthController } from './health.controller';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, ollamaConfig, cleansingConfig],
    }),

    // Rate Limiting: each run may fan out into many model calls
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        throttlers: [
          {
            ttl: config.get<number>('app.throttleTtl', 60000),
            limit: config.get<number>('app.throttleLimit', 20),
          },
        ],
      }),
    }),

    // Core modules
    OllamaModule,

    // Feature modules
    CleansingModule,
  ],
  controllers: [HealthController],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule { }
