import {
  Column,
  CreateDateColumn,
  Entity,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import type { CompanyProfileInput } from '../matching/interfaces/matching.types';

@Entity('company_profiles')
export class CompanyProfile implements CompanyProfileInput {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true })
  companyName!: string;

  @Column({ default: '' })
  industry!: string;

  @Column({ default: '' })
  businessType!: string;

  @Column({ default: '' })
  companySize!: string;

  @Column({ type: 'text', default: '' })
  description!: string;

  @Column({ type: 'jsonb', default: () => "'[]'" })
  services!: string[];

  @Column({ type: 'jsonb', default: () => "'[]'" })
  targetMarkets!: string[];

  @Column({ type: 'jsonb', default: () => "'[]'" })
  keyChallenges!: string[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
