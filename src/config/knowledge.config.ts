const DEFAULT_ADVISOR_INSTRUCTIONS =
  'You are an agronomist assisting farmers. Answer briefly and practically. ' +
  'Prefer farmer-specific facts over country-specific ones, and country-specific ones over general knowledge. ' +
  'Always state pre-harvest intervals and dosages exactly as given in the provided information.';

export default () => ({
  knowledge: {
    topK: parseInt(process.env.KNOWLEDGE_TOP_K || '5', 10),
    defaultLanguage: process.env.KNOWLEDGE_DEFAULT_LANGUAGE || 'hr',
  },
  hierarchy: {
    maxItemsPerLevel: parseInt(process.env.HIERARCHY_MAX_ITEMS_PER_LEVEL || '5', 10),
    cacheTtl: parseInt(process.env.HIERARCHY_CACHE_TTL || '300', 10),
    externalEnabled: process.env.HIERARCHY_EXTERNAL_ENABLED === 'true',
    instructions: process.env.ADVISOR_INSTRUCTIONS || DEFAULT_ADVISOR_INSTRUCTIONS,
  },
  vectorDb: {
    provider: 'pinecone',
    pinecone: {
      apiKey: process.env.PINECONE_API_KEY,
      indexName: process.env.PINECONE_INDEX_NAME || 'agro-knowledge',
      cloud: process.env.PINECONE_CLOUD || 'aws',
      region: process.env.PINECONE_REGION || 'us-east-1',
    },
  },
  llm: {
    provider: 'groq',
    temperature: parseFloat(process.env.LLM_TEMPERATURE || '0.3'),
    maxTokens: parseInt(process.env.LLM_MAX_TOKENS || '1024', 10),
    groq: {
      apiKey: process.env.GROQ_API_KEY,
      model: process.env.GROQ_MODEL || 'llama-3.3-70b-versatile',
    },
    huggingface: {
      apiKey: process.env.HF_API_KEY,
      embeddingModel: process.env.HF_EMBEDDING_MODEL || 'sentence-transformers/all-MiniLM-L6-v2',
    },
  },
  embedding: {
    dimension: parseInt(process.env.EMBEDDING_DIMENSION || '384', 10),
  },
});
