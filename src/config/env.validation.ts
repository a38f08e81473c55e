import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export class EnvironmentVariables {
  // Pinecone Configuration
  @IsString()
  @IsNotEmpty()
  PINECONE_API_KEY!: string;

  @IsString()
  @IsOptional()
  PINECONE_INDEX_NAME?: string;

  @IsString()
  @IsOptional()
  PINECONE_CLOUD?: string;

  @IsString()
  @IsOptional()
  PINECONE_REGION?: string;

  // HuggingFace Embedding Configuration
  @IsString()
  @IsNotEmpty()
  HF_API_KEY!: string;

  @IsString()
  @IsOptional()
  HF_EMBEDDING_MODEL?: string;

  @IsNumber()
  @IsOptional()
  EMBEDDING_DIMENSION?: number;

  // Groq LLM Configuration
  @IsString()
  @IsNotEmpty()
  GROQ_API_KEY!: string;

  @IsString()
  @IsOptional()
  GROQ_MODEL?: string;

  @IsNumber()
  @IsOptional()
  @Min(0)
  @Max(2)
  LLM_TEMPERATURE?: number;

  @IsNumber()
  @IsOptional()
  LLM_MAX_TOKENS?: number;

  // Knowledge search
  @IsNumber()
  @IsOptional()
  @Min(1)
  @Max(100)
  KNOWLEDGE_TOP_K?: number;

  @IsString()
  @IsOptional()
  KNOWLEDGE_DEFAULT_LANGUAGE?: string;

  // Information hierarchy
  @IsNumber()
  @IsOptional()
  @Min(1)
  HIERARCHY_MAX_ITEMS_PER_LEVEL?: number;

  @IsNumber()
  @IsOptional()
  @Min(0)
  HIERARCHY_CACHE_TTL?: number;

  @IsBooleanString()
  @IsOptional()
  HIERARCHY_EXTERNAL_ENABLED?: string;

  @IsString()
  @IsOptional()
  ADVISOR_INSTRUCTIONS?: string;

  // Storage
  @IsString()
  @IsOptional()
  DB_HOST?: string;

  @IsNumber()
  @IsOptional()
  DB_PORT?: number;

  @IsString()
  @IsOptional()
  DB_USER?: string;

  @IsString()
  @IsOptional()
  DB_PASSWORD?: string;

  @IsString()
  @IsOptional()
  DB_NAME?: string;

  @IsString()
  @IsOptional()
  REDIS_HOST?: string;

  @IsNumber()
  @IsOptional()
  REDIS_PORT?: number;

  @IsString()
  @IsOptional()
  REDIS_PASSWORD?: string;

  // General Configuration
  @IsString()
  @IsOptional()
  CORS_ORIGINS?: string;

  @IsIn(['development', 'production', 'test'])
  @IsOptional()
  NODE_ENV?: string;

  @IsNumber()
  @IsOptional()
  PORT?: number;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(
      `Environment validation failed!\n\nMissing or invalid variables:\n${errors
        .map((err) => `  - ${err.property}: ${Object.values(err.constraints || {}).join(', ')}`)
        .join('\n')}\n\nPlease check your .env file and ensure all required variables are set.`,
    );
  }

  return validatedConfig;
}
