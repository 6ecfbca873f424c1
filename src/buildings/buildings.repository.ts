import { Injectable } from '@nestjs/common';
import { TransactionContext } from '../common/database/transaction-context';
import { TypeOrmRepository } from '../common/database/typeorm.repository';
import { Coordinate } from '../common/value-objects/coordinate';
import { Building } from './building';
import { BuildingEntity } from './building.entity';

@Injectable()
export class BuildingsRepository extends TypeOrmRepository<Building, BuildingEntity> {
  protected readonly model = BuildingEntity;
  protected readonly alias = 'building';

  constructor(transactionContext: TransactionContext) {
    super(transactionContext);
  }

  protected toModel(building: Building): BuildingEntity {
    const model = new BuildingEntity();
    model.id = building.buildingId;
    model.address = building.address;
    model.latitude = building.coordinate.latitude;
    model.longitude = building.coordinate.longitude;
    return model;
  }

  protected toEntity(model: BuildingEntity): Building {
    return {
      buildingId: model.id,
      address: model.address,
      coordinate: new Coordinate(model.latitude, model.longitude),
    };
  }
}
