import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { KnowledgeModule } from './modules/knowledge/knowledge.module';
import { InformationModule } from './modules/information/information.module';
import { VectordbModule } from './modules/vectordb/vectordb.module';
import { LlmModule } from './modules/llm/llm.module';
import { PineconeModule } from './modules/pinecone/pinecone.module';
import { RedisModule } from './modules/redis/redis.module';
import { DatabaseModule } from './modules/database/database.module';
import knowledgeConfig from './config/knowledge.config';
import { validate } from './config/env.validation';

@Module({
  imports: [
    ThrottlerModule.forRoot([
      {
        ttl: 60000, // 60 seconds
        limit: 60, // 60 requests per 60 seconds
      },
    ]),
    ConfigModule.forRoot({
      isGlobal: true,
      load: [knowledgeConfig],
      validate,
    }),
    DatabaseModule,
    RedisModule,
    PineconeModule,
    VectordbModule,
    LlmModule,
    KnowledgeModule,
    InformationModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
