import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import {
  MatchStatus,
  RelevanceTier,
  ScoredMatch,
} from './interfaces/matching.types';
import { OracleErrorKind } from './matching.errors';

@Entity('matches')
@Index(['companyId', 'status'])
export class Match implements ScoredMatch {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  companyId!: string;

  @Column({ type: 'uuid' })
  opportunityId!: string;

  @Column({ type: 'double precision' })
  relevanceScore!: number;

  @Column({ type: 'varchar', length: 10 })
  relevanceTier!: RelevanceTier;

  @Column({ type: 'text' })
  reasoning!: string;

  @Column({ type: 'jsonb', default: () => "'[]'" })
  keyMatchFactors!: string[];

  @Column({ type: 'text', nullable: true })
  actionability!: string | null;

  @Column({ type: 'varchar', length: 20, default: MatchStatus.PENDING })
  status!: MatchStatus;

  @Column({ type: 'varchar', length: 40, nullable: true })
  errorKind!: OracleErrorKind | null;

  @Column({ type: 'timestamptz' })
  createdAt!: Date;
}
