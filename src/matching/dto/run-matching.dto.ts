import { IsEnum, IsNumber, IsOptional, IsUUID, Max, Min } from 'class-validator';
import { MatchStatus } from '../interfaces/matching.types';

export class RunMatchingDto {
  @IsUUID()
  companyId!: string;

  @IsNumber()
  @Min(0)
  @Max(1)
  @IsOptional()
  minScore?: number;
}

export class UpdateMatchStatusDto {
  @IsEnum(MatchStatus)
  status!: MatchStatus;
}

export class ListMatchesQueryDto {
  @IsEnum(MatchStatus)
  @IsOptional()
  status?: MatchStatus;
}
