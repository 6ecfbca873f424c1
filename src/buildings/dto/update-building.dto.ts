import { PartialType } from '@nestjs/swagger';
import { Coordinate } from '../../common/value-objects/coordinate';
import { Building } from '../building';
import { CreateBuildingDto } from './create-building.dto';

export class UpdateBuildingDto extends CreateBuildingDto {}

export class PatchBuildingDto extends PartialType(CreateBuildingDto) {}

export const applyBuildingUpdate = (
  building: Building,
  dto: PatchBuildingDto,
): Building => {
  const latitude = dto.latitude ?? building.coordinate.latitude;
  const longitude = dto.longitude ?? building.coordinate.longitude;

  return {
    ...building,
    address: dto.address ?? building.address,
    coordinate: new Coordinate(latitude, longitude),
  };
};
