import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { ActivitiesController } from './activities.controller';
import { ActivitiesRepository } from './activities.repository';
import { ActivitiesService } from './activities.service';
import { ActivityNestingValidator } from './activity-nesting.validator';

@Module({
  imports: [AuthModule],
  controllers: [ActivitiesController],
  providers: [ActivitiesRepository, ActivitiesService, ActivityNestingValidator],
  exports: [ActivitiesRepository, ActivitiesService],
})
export class ActivitiesModule {}
