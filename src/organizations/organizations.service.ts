import { Injectable, Logger } from '@nestjs/common';
import { ActivitiesRepository } from '../activities/activities.repository';
import { ActivityNotFoundException } from '../activities/activity.exceptions';
import { BuildingsRepository } from '../buildings/buildings.repository';
import { BuildingNotFoundException } from '../buildings/building.exceptions';
import { Filters } from '../common/database/typeorm.repository';
import { NO_PAGINATION, Page, PaginationInfo } from '../common/pagination/page';
import { AnyFieldSpecification, InList, SortSpecification } from '../common/specification';
import { Organization, uniqueIds } from './organization';
import { OrganizationActivitiesRepository } from './organization-activities.repository';
import { OrganizationNotFoundException } from './organization.exceptions';
import { OrganizationsRepository } from './organizations.repository';

const ACTIVITY_ID_IN = InList('id');

@Injectable()
export class OrganizationsService {
  private readonly logger = new Logger(OrganizationsService.name);

  constructor(
    private readonly organizationsRepository: OrganizationsRepository,
    private readonly organizationActivitiesRepository: OrganizationActivitiesRepository,
    private readonly buildingsRepository: BuildingsRepository,
    private readonly activitiesRepository: ActivitiesRepository,
  ) {}

  async create(organization: Organization): Promise<Organization> {
    const activityIds = uniqueIds(organization.activityIds);
    await this.validateBuildingExists(organization.buildingId);
    await this.validateActivitiesExist(activityIds);

    const created = await this.organizationsRepository.create(organization);
    await this.organizationActivitiesRepository.create(created.organizationId, activityIds);

    this.logger.log(`Organization ${created.organizationId} created`);
    return { ...created, activityIds };
  }

  async getPage(
    pagination: PaginationInfo,
    specifications: readonly AnyFieldSpecification[] = [],
    sortSpecifications: readonly SortSpecification[] = [],
    filters: Filters = [],
  ): Promise<Page<Organization>> {
    return this.organizationsRepository.getPage(
      pagination,
      specifications,
      sortSpecifications,
      filters,
    );
  }

  async getById(organizationId: string): Promise<Organization> {
    const organization = await this.organizationsRepository.getById(organizationId);
    if (!organization) {
      throw new OrganizationNotFoundException(organizationId);
    }
    return organization;
  }

  /** Связи с видами деятельности заменяются целиком */
  async update(organization: Organization): Promise<Organization> {
    const activityIds = uniqueIds(organization.activityIds);
    await this.validateBuildingExists(organization.buildingId);
    await this.validateActivitiesExist(activityIds);

    const saved = await this.organizationsRepository.update(organization);
    await this.organizationActivitiesRepository.delete(saved.organizationId);
    await this.organizationActivitiesRepository.create(saved.organizationId, activityIds);

    return { ...saved, activityIds };
  }

  async delete(organizationId: string): Promise<void> {
    const organization = await this.getById(organizationId);
    await this.organizationActivitiesRepository.delete(organization.organizationId);
    await this.organizationsRepository.delete(organization.organizationId);
    this.logger.log(`Organization ${organizationId} deleted`);
  }

  private async validateBuildingExists(buildingId: string): Promise<void> {
    const building = await this.buildingsRepository.getById(buildingId);
    if (!building) {
      throw new BuildingNotFoundException(buildingId);
    }
  }

  private async validateActivitiesExist(activityIds: readonly string[]): Promise<void> {
    if (activityIds.length === 0) {
      return;
    }

    const specification = ACTIVITY_ID_IN.newWithValue(activityIds);
    const existing = await this.activitiesRepository.getCount([specification]);
    if (existing === activityIds.length) {
      return;
    }

    const found = await this.activitiesRepository.getList(NO_PAGINATION, [specification]);
    const foundIds = new Set(found.map((activity) => activity.activityId));
    throw new ActivityNotFoundException(activityIds.filter((id) => !foundIds.has(id)));
  }
}
