import { Body, Controller, Get, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import { CompanyProfile } from './company-profile.entity';
import { CreateCompanyProfileDto } from './dto/create-company-profile.dto';
import { ProfilesService } from './profiles.service';

@Controller('profiles')
export class ProfilesController {
  constructor(private readonly profilesService: ProfilesService) {}

  @Post()
  create(@Body() dto: CreateCompanyProfileDto): Promise<CompanyProfile> {
    return this.profilesService.create(dto);
  }

  @Get(':id')
  findOne(@Param('id', ParseUUIDPipe) id: string): Promise<CompanyProfile> {
    return this.profilesService.findOne(id);
  }
}
