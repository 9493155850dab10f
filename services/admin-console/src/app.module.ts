import { createLoggerOptions } from '@spo-admin/logger';
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { CliModule } from './cli/cli.module';
import { type AppConfig, appConfig } from './config/app.config';
import { sharepointConfig } from './config/sharepoint.config';
import { storageConfig } from './config/storage.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      ignoreEnvFile: true,
      load: [appConfig, storageConfig, sharepointConfig],
    }),
    LoggerModule.forRootAsync({
      useFactory(config: AppConfig['app']) {
        return createLoggerOptions({ level: config.logLevel, pretty: config.isDev });
      },
      inject: [appConfig.KEY],
    }),
    CliModule,
  ],
})
export class AppModule {}
