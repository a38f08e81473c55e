import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { InformationController } from './information.controller';
import { AnswerService, InformationHierarchyService } from './services';
import {
  ExternalKnowledgeProvider,
  FarmerRecordsProvider,
  KnowledgeBaseProvider,
} from './providers';
import { KnowledgeModule } from '../knowledge/knowledge.module';
import { LlmModule } from '../llm/llm.module';
import { Farmer, Field } from '../database/entities';

@Module({
  imports: [TypeOrmModule.forFeature([Farmer, Field]), KnowledgeModule, LlmModule],
  controllers: [InformationController],
  providers: [
    InformationHierarchyService,
    AnswerService,
    FarmerRecordsProvider,
    KnowledgeBaseProvider,
    ExternalKnowledgeProvider,
  ],
  exports: [InformationHierarchyService],
})
export class InformationModule {}
