// Bulk-index a JSON array of documents: npm run ingest -- ./fis-export.json
import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { KnowledgeIndexingService } from '../modules/knowledge/services';
import { errorMessage } from '../common/utils/error.util';
import { parseDocuments } from './parse-documents';

dotenv.config();

const logger = new Logger('Ingest');

async function main(): Promise<number> {
  const file = process.argv[2];
  if (!file) {
    logger.error('Usage: ingest-documents <documents.json>');
    return 2;
  }

  const documents = parseDocuments(readFileSync(resolve(file), 'utf8'));
  logger.log(`Indexing ${documents.length} documents from ${file}`);

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });

  try {
    const stats = await app.get(KnowledgeIndexingService).bulkIndexDocuments(documents);
    logger.log(`Done: ${stats.success}/${stats.total} indexed, ${stats.failed} failed`);
    return stats.failed > 0 ? 1 : 0;
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      logger.error(errorMessage(error));
      process.exit(1);
    });
}
