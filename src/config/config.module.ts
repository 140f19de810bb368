import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule, ConfigService } from '@nestjs/config';
import configuration, { AppConfig } from './configuration';
import { NOTIFIER_SETTINGS, resolveNotifierSettings } from './notifier-settings';

@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      cache: true,
    }),
  ],
  providers: [
    {
      provide: NOTIFIER_SETTINGS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig>) =>
        resolveNotifierSettings(configService.getOrThrow('notifier', { infer: true })),
    },
  ],
  exports: [NOTIFIER_SETTINGS],
})
export class ConfigModule {}
