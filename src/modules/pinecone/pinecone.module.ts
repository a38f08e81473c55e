// modules/pinecone/pinecone.module.ts
import { Module } from '@nestjs/common';
import { PineconeService } from './pinecone.service';
import { PineconeInitService } from './pinecone-init.service';

/** Owns the Pinecone client; creates the knowledge index on boot when missing */
@Module({
  providers: [PineconeService, PineconeInitService],
  exports: [PineconeService],
})
export class PineconeModule {}
