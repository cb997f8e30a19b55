import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DemoOpportunityCollector } from './collectors/demo.collector';
import { OPPORTUNITY_COLLECTOR } from './interfaces/opportunity-collector.interface';
import { OpportunitiesController } from './opportunities.controller';
import { OpportunitiesService } from './opportunities.service';
import { Opportunity } from './opportunity.entity';

@Module({
  imports: [TypeOrmModule.forFeature([Opportunity])],
  controllers: [OpportunitiesController],
  providers: [
    OpportunitiesService,
    DemoOpportunityCollector,
    {
      provide: OPPORTUNITY_COLLECTOR,
      useExisting: DemoOpportunityCollector,
    },
  ],
  exports: [OpportunitiesService],
})
export class OpportunitiesModule {}
