import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import {
  OpportunityInput,
  OpportunityType,
} from '../matching/interfaces/matching.types';

@Entity('opportunities')
export class Opportunity implements OpportunityInput {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  /** sha256 of the source URL (or title when there is none). */
  @Index({ unique: true })
  @Column()
  dedupeKey!: string;

  @Column({ length: 500 })
  title!: string;

  @Column({ type: 'text', default: '' })
  description!: string;

  @Column({ type: 'text', default: '' })
  content!: string;

  @Column({ default: '' })
  source!: string;

  @Column({ length: 1000, default: '' })
  sourceUrl!: string;

  @Column({ type: 'varchar', length: 20 })
  type!: OpportunityType;

  @Column({ type: 'jsonb', default: () => "'[]'" })
  tags!: string[];

  @Column({ type: 'timestamptz' })
  publishedAt!: Date;

  @Column({ type: 'jsonb', default: () => "'{}'" })
  metadata!: Record<string, unknown>;

  @CreateDateColumn()
  createdAt!: Date;
}
