export { KnowledgeDocumentEntity } from './knowledge-document.entity';
export { Farmer } from './farmer.entity';
export { Field } from './field.entity';
