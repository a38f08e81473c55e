export type { InformationProvider } from './information-provider.interface';
export { FarmerRecordsProvider } from './farmer-records.provider';
export { KnowledgeBaseProvider } from './knowledge-base.provider';
export { ExternalKnowledgeProvider } from './external-knowledge.provider';
