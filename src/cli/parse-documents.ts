import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { AddDocumentDto } from '../modules/knowledge/dto/add-document.dto';

/**
 * Documents from a JSON export, validated like the HTTP endpoint validates them
 */
export function parseDocuments(raw: string): AddDocumentDto[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error('Expected a JSON array of documents');
  }

  const documents = plainToInstance(AddDocumentDto, parsed);
  const problems = documents.flatMap((doc, index) =>
    validateSync(doc, { whitelist: true }).map(
      (err) => `  - [${index}] ${err.property}: ${Object.values(err.constraints || {}).join(', ')}`,
    ),
  );

  if (problems.length > 0) {
    throw new Error(`Invalid documents:\n${problems.join('\n')}`);
  }

  return documents;
}
