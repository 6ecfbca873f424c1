import { Injectable } from '@nestjs/common';
import { TransactionContext } from '../common/database/transaction-context';
import { TypeOrmRepository } from '../common/database/typeorm.repository';
import { Activity } from './activity';
import { ActivityEntity } from './activity.entity';

@Injectable()
export class ActivitiesRepository extends TypeOrmRepository<Activity, ActivityEntity> {
  protected readonly model = ActivityEntity;
  protected readonly alias = 'activity';

  constructor(transactionContext: TransactionContext) {
    super(transactionContext);
  }

  protected toModel(activity: Activity): ActivityEntity {
    const model = new ActivityEntity();
    model.id = activity.activityId;
    model.parentId = activity.parentId;
    model.name = activity.name;
    return model;
  }

  protected toEntity(model: ActivityEntity): Activity {
    return {
      activityId: model.id,
      parentId: model.parentId,
      name: model.name,
    };
  }
}
