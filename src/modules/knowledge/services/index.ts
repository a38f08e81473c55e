export { KnowledgeSearchService } from './knowledge-search.service';
export { KnowledgeIndexingService } from './knowledge-indexing.service';
