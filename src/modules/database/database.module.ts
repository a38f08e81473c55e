import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { KnowledgeDocumentEntity, Farmer, Field } from './entities';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const isProduction = configService.get<string>('NODE_ENV') === 'production';
        return {
          type: 'postgres',
          host: configService.get<string>('DB_HOST') || 'localhost',
          port: configService.get<number>('DB_PORT') || 5432,
          username: configService.get<string>('DB_USER') || 'agro',
          password: configService.get<string>('DB_PASSWORD') || 'changeme',
          database: configService.get<string>('DB_NAME') || 'agro_knowledge',
          entities: [KnowledgeDocumentEntity, Farmer, Field],
          // farmers and fields belong to the farmer database; only the registry is ours
          synchronize: false,
          logging: !isProduction ? ['error', 'warn'] : ['error'],
          extra: {
            max: 10,
            idleTimeoutMillis: 30000,
          },
        };
      },
    }),
    TypeOrmModule.forFeature([KnowledgeDocumentEntity, Farmer, Field]),
  ],
  exports: [TypeOrmModule],
})
export class DatabaseModule {}
