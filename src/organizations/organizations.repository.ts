import { Injectable } from '@nestjs/common';
import { TransactionContext } from '../common/database/transaction-context';
import { TypeOrmRepository } from '../common/database/typeorm.repository';
import { PhoneNumber } from '../common/value-objects/phone-number';
import { Organization } from './organization';
import { OrganizationActivitiesRepository } from './organization-activities.repository';
import { OrganizationEntity } from './organization.entity';

@Injectable()
export class OrganizationsRepository extends TypeOrmRepository<Organization, OrganizationEntity> {
  protected readonly model = OrganizationEntity;
  protected readonly alias = 'organization';

  constructor(
    transactionContext: TransactionContext,
    private readonly organizationActivitiesRepository: OrganizationActivitiesRepository,
  ) {
    super(transactionContext);
  }

  protected toModel(organization: Organization): OrganizationEntity {
    const model = new OrganizationEntity();
    model.id = organization.organizationId;
    model.name = organization.name;
    model.buildingId = organization.buildingId;
    model.phoneNumbers = organization.phoneNumbers.map((phone) => phone.number);
    return model;
  }

  protected toEntity(model: OrganizationEntity): Organization {
    return {
      organizationId: model.id,
      name: model.name,
      buildingId: model.buildingId,
      phoneNumbers: model.phoneNumbers.map((number) => new PhoneNumber(number)),
      activityIds: [],
    };
  }

  protected async hydrate(organizations: Organization[]): Promise<Organization[]> {
    const activityIds = await this.organizationActivitiesRepository.getActivityIds(
      organizations.map((organization) => organization.organizationId),
    );

    return organizations.map((organization) => ({
      ...organization,
      activityIds: activityIds.get(organization.organizationId) ?? [],
    }));
  }
}
