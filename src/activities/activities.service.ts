import { Injectable, Logger } from '@nestjs/common';
import { Page, PaginationInfo } from '../common/pagination/page';
import { AnyFieldSpecification, SortSpecification } from '../common/specification';
import { ActivitiesRepository } from './activities.repository';
import { Activity } from './activity';
import { ActivityNotFoundException } from './activity.exceptions';
import { ActivityNestingValidator } from './activity-nesting.validator';

@Injectable()
export class ActivitiesService {
  private readonly logger = new Logger(ActivitiesService.name);

  constructor(
    private readonly activitiesRepository: ActivitiesRepository,
    private readonly nestingValidator: ActivityNestingValidator,
  ) {}

  async create(activity: Activity): Promise<Activity> {
    if (activity.parentId) {
      await this.getById(activity.parentId);
      await this.nestingValidator.validateNesting(activity.parentId);
    }

    const created = await this.activitiesRepository.create(activity);
    this.logger.log(`Activity ${created.activityId} created`);
    return created;
  }

  async getPage(
    pagination: PaginationInfo,
    specifications: readonly AnyFieldSpecification[] = [],
    sortSpecifications: readonly SortSpecification[] = [],
  ): Promise<Page<Activity>> {
    return this.activitiesRepository.getPage(pagination, specifications, sortSpecifications);
  }

  async getById(activityId: string): Promise<Activity> {
    const activity = await this.activitiesRepository.getById(activityId);
    if (!activity) {
      throw new ActivityNotFoundException(activityId);
    }
    return activity;
  }

  async update(activity: Activity): Promise<Activity> {
    if (activity.parentId) {
      await this.getById(activity.parentId);
      await this.nestingValidator.validateNesting(activity.parentId, activity.activityId);
    }

    return this.activitiesRepository.update(activity);
  }

  async delete(activityId: string): Promise<void> {
    const activity = await this.getById(activityId);
    await this.activitiesRepository.delete(activity.activityId);
    this.logger.log(`Activity ${activityId} deleted`);
  }
}
