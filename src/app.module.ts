import { Module, DynamicModule } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { BullModule } from '@nestjs/bullmq';
import { ScheduleModule } from '@nestjs/schedule';
import { ConfigModule, ConfigService } from '@nestjs/config';
import configuration from './common/config/configuration';

// Providers
import { SupabaseModule } from './providers/supabase/supabase.module';
import { R2Module } from './providers/r2/r2.module';
import { DeepgramModule } from './providers/deepgram/deepgram.module';
import { DownloaderModule } from './providers/downloader/downloader.module';
import { FfmpegModule } from './providers/ffmpeg/ffmpeg.module';
import { MailModule } from './providers/mail/mail.module';

// Business Modules
import { TasksModule } from './modules/tasks/tasks.module';
import { TranscriptionsModule } from './modules/transcriptions/transcriptions.module';
import { HealthModule } from './modules/health/health.module';

// Guards
import { ApiKeyGuard } from './common/guards/api-key.guard';

@Module({})
export class AppModule {
  static forRoot(): DynamicModule {
    // 只有当 REDIS_ENABLED=true 时才加载 BullMQ
    const redisEnabled = process.env.REDIS_ENABLED === 'true';

    return {
      module: AppModule,
      imports: [
        // Config
        ConfigModule.forRoot({
          isGlobal: true,
          load: [configuration],
          envFilePath: ['.env.local', '.env'],
        }),

        // Schedule (定时任务)
        ScheduleModule.forRoot(),

        ...(redisEnabled
          ? [
              BullModule.forRootAsync({
                imports: [ConfigModule],
                useFactory: (configService: ConfigService) => ({
                  connection: {
                    url: configService.get<string>('redis.url'),
                  },
                }),
                inject: [ConfigService],
              }),
            ]
          : []),

        // Providers
        SupabaseModule,
        R2Module,
        DeepgramModule,
        DownloaderModule,
        FfmpegModule,
        MailModule,

        // Business Modules
        TasksModule.register(redisEnabled),
        TranscriptionsModule,
        HealthModule,
      ],
      providers: [
        {
          provide: APP_GUARD,
          useClass: ApiKeyGuard,
        },
      ],
    };
  }
}
