import { Module } from '@nestjs/common';
import { ActivitiesModule } from '../activities/activities.module';
import { BuildingsModule } from '../buildings/buildings.module';
import { OrganizationActivitiesRepository } from './organization-activities.repository';
import { OrganizationsController } from './organizations.controller';
import { OrganizationsRepository } from './organizations.repository';
import { OrganizationsService } from './organizations.service';

@Module({
  // Репозитории берут EntityManager из TransactionContext
  imports: [ActivitiesModule, BuildingsModule],
  controllers: [OrganizationsController],
  providers: [OrganizationsRepository, OrganizationActivitiesRepository, OrganizationsService],
})
export class OrganizationsModule {}
