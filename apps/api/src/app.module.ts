import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { MulterModule } from '@nestjs/platform-express';
import { AppErrorFilter } from './app-error.filter';
import { APP_CONFIG, AppConfig } from './config';
import { ConfigModule } from './config.module';
import { DbService } from './db.service';
import { DemoController } from './demo.controller';
import { ImageSchemaService } from './image-schema.service';
import { createInferenceEndpoint, InferenceClient, SQL_ENDPOINT, VISION_ENDPOINT } from './inference.client';
import { Nl2SqlService } from './nl2sql.service';
import { QueryController } from './query.controller';
import { SchemaService } from './schema.service';
import { SessionController } from './session.controller';
import { SessionStore } from './session.store';

@Module({
  imports: [
    ConfigModule,
    // Oversized uploads are cut off while streaming and surface as 413.
    MulterModule.registerAsync({
      imports: [ConfigModule],
      useFactory: (config: AppConfig) => ({ limits: { fileSize: config.maxImageBytes, files: 1 } }),
      inject: [APP_CONFIG],
    }),
  ],
  controllers: [DemoController, SessionController, QueryController],
  providers: [
    {
      provide: SQL_ENDPOINT,
      useFactory: (config: AppConfig) => createInferenceEndpoint(config, config.sqlModel),
      inject: [APP_CONFIG],
    },
    {
      provide: VISION_ENDPOINT,
      useFactory: (config: AppConfig) => createInferenceEndpoint(config, config.visionModel),
      inject: [APP_CONFIG],
    },
    { provide: APP_FILTER, useClass: AppErrorFilter },
    DbService,
    SchemaService,
    SessionStore,
    InferenceClient,
    ImageSchemaService,
    Nl2SqlService,
  ],
})
export class AppModule {}
