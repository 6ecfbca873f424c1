import { Injectable } from '@nestjs/common';
import { Repository } from 'typeorm';
import { TransactionContext } from '../common/database/transaction-context';
import { OrganizationActivityEntity } from './organization-activity.entity';

/** Строки связи organization_activities, без доменной сущности */
@Injectable()
export class OrganizationActivitiesRepository {
  constructor(private readonly transactionContext: TransactionContext) {}

  private get repository(): Repository<OrganizationActivityEntity> {
    return this.transactionContext.manager.getRepository(OrganizationActivityEntity);
  }

  async create(organizationId: string, activityIds: readonly string[]): Promise<void> {
    if (activityIds.length === 0) {
      return;
    }
    await this.repository.insert(
      activityIds.map((activityId) => ({ organizationId, activityId })),
    );
  }

  async delete(organizationId: string): Promise<void> {
    await this.repository.delete({ organizationId });
  }

  /** Один запрос на всю страницу организаций */
  async getActivityIds(
    organizationIds: readonly string[],
  ): Promise<Map<string, string[]>> {
    const result = new Map<string, string[]>(organizationIds.map((id) => [id, []]));
    if (organizationIds.length === 0) {
      return result;
    }

    const rows = await this.repository
      .createQueryBuilder('link')
      .where('link.organizationId IN (:...organizationIds)', {
        organizationIds: [...organizationIds],
      })
      .getMany();

    for (const row of rows) {
      result.get(row.organizationId)?.push(row.activityId);
    }
    return result;
  }
}
