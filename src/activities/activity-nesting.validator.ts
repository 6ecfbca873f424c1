import { Injectable } from '@nestjs/common';
import { ActivitiesRepository } from './activities.repository';
import { MAX_NESTING_LEVEL } from './activity';
import {
  ActivityCyclicParentException,
  ActivityMaximumNestingException,
} from './activity.exceptions';

@Injectable()
export class ActivityNestingValidator {
  constructor(private readonly activitiesRepository: ActivitiesRepository) {}

  /**
   * Идет от `parentId` вверх до корня. Глубина родителя равна 1; ошибка,
   * если она дошла до MAX_NESTING_LEVEL раньше корня.
   *
   * `activityId` передается при обновлении: встретить его в цепочке
   * значит сделать узел собственным предком.
   */
  async validateNesting(parentId: string, activityId?: string): Promise<void> {
    if (parentId === activityId) {
      throw new ActivityCyclicParentException(activityId, parentId);
    }

    let depth = 1;
    let current = await this.activitiesRepository.getById(parentId);

    while (current?.parentId) {
      if (current.parentId === activityId) {
        throw new ActivityCyclicParentException(activityId, parentId);
      }

      depth++;
      if (depth >= MAX_NESTING_LEVEL) {
        throw new ActivityMaximumNestingException();
      }
      current = await this.activitiesRepository.getById(current.parentId);
    }
  }
}
