import { EntityNotFoundException } from '../common/exceptions/domain.exception';

export class BuildingNotFoundException extends EntityNotFoundException {
  constructor(buildingId: string) {
    super(`Building ${buildingId} not found`, { buildingId });
  }
}
