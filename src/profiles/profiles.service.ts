import { ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CompanyProfile } from './company-profile.entity';
import { CreateCompanyProfileDto } from './dto/create-company-profile.dto';

function cleanList(items: string[] | undefined): string[] {
  return (items ?? []).map((item) => item.trim()).filter((item) => item.length > 0);
}

@Injectable()
export class ProfilesService {
  constructor(
    @InjectRepository(CompanyProfile)
    private readonly profileRepository: Repository<CompanyProfile>,
  ) {}

  async create(dto: CreateCompanyProfileDto): Promise<CompanyProfile> {
    const companyName = dto.companyName.trim();
    const existing = await this.profileRepository.findOne({
      where: { companyName },
    });
    if (existing) {
      throw new ConflictException(`Profile for ${companyName} already exists`);
    }

    const profile = this.profileRepository.create({
      companyName,
      industry: dto.industry.trim(),
      businessType: dto.businessType?.trim() ?? '',
      companySize: dto.companySize?.trim() ?? '',
      description: dto.description?.trim() ?? '',
      services: cleanList(dto.services),
      targetMarkets: cleanList(dto.targetMarkets),
      keyChallenges: cleanList(dto.keyChallenges),
    });

    return this.profileRepository.save(profile);
  }

  async findOne(id: string): Promise<CompanyProfile> {
    const profile = await this.profileRepository.findOne({ where: { id } });
    if (!profile) {
      throw new NotFoundException(`Profile ${id} not found`);
    }
    return profile;
  }
}
