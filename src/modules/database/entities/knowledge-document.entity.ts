import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';

/**
 * Registry row for every record upserted into the knowledge index.
 * The id is the vector id.
 */
@Entity('knowledge_documents')
export class KnowledgeDocumentEntity {
  @PrimaryColumn({ type: 'varchar', length: 255 })
  id!: string;

  @Column('text')
  content!: string;

  @Column({ type: 'varchar', length: 255 })
  source!: string;

  @Column({ name: 'document_type', type: 'varchar', length: 64 })
  @Index()
  documentType!: string;

  @Column({ type: 'varchar', length: 16 })
  language!: string;

  @Column({ name: 'country_code', type: 'varchar', length: 16 })
  @Index()
  countryCode!: string;

  @Column({ type: 'jsonb', nullable: true })
  metadata!: Record<string, unknown> | null;

  @Column({ name: 'is_active', default: true })
  isActive!: boolean;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @Column({ name: 'indexed_at', type: 'timestamp' })
  indexedAt!: Date;
}
