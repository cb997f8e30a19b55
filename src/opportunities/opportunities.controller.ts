import { Body, Controller, Get, HttpCode, Post, Query } from '@nestjs/common';
import {
  CreateOpportunityDto,
  ListOpportunitiesQueryDto,
} from './dto/create-opportunity.dto';
import { CollectionResult, OpportunitiesService } from './opportunities.service';
import { Opportunity } from './opportunity.entity';

@Controller('opportunities')
export class OpportunitiesController {
  constructor(private readonly opportunitiesService: OpportunitiesService) {}

  @Post()
  create(@Body() dto: CreateOpportunityDto): Promise<Opportunity> {
    return this.opportunitiesService.create(dto);
  }

  @Get()
  findAll(@Query() query: ListOpportunitiesQueryDto): Promise<Opportunity[]> {
    return this.opportunitiesService.findAll(query);
  }

  @Post('collect')
  @HttpCode(200)
  collect(): Promise<CollectionResult> {
    return this.opportunitiesService.collect();
  }
}
