import { Type } from 'class-transformer';
import {
  IsArray,
  IsDate,
  IsEnum,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  IsUrl,
  MaxLength,
} from 'class-validator';
import { OpportunityType } from '../../matching/interfaces/matching.types';

export class CreateOpportunityDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  title!: string;

  @IsString()
  @IsOptional()
  description?: string;

  @IsString()
  @IsOptional()
  content?: string;

  @IsString()
  @IsOptional()
  source?: string;

  @IsUrl()
  @IsOptional()
  sourceUrl?: string;

  @IsEnum(OpportunityType)
  type!: OpportunityType;

  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  tags?: string[];

  @Type(() => Date)
  @IsDate()
  @IsOptional()
  publishedAt?: Date;

  @IsObject()
  @IsOptional()
  metadata?: Record<string, unknown>;
}

export class ListOpportunitiesQueryDto {
  @IsEnum(OpportunityType)
  @IsOptional()
  type?: OpportunityType;

  @IsString()
  @IsOptional()
  industry?: string;
}
