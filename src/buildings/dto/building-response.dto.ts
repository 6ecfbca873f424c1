import { ApiProperty } from '@nestjs/swagger';
import { Building } from '../building';

export class BuildingResponseDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty()
  address!: string;

  @ApiProperty({ example: 55.7558 })
  latitude!: number;

  @ApiProperty({ example: 37.6173 })
  longitude!: number;
}

export const toBuildingResponse = (building: Building): BuildingResponseDto => ({
  id: building.buildingId,
  address: building.address,
  latitude: building.coordinate.latitude,
  longitude: building.coordinate.longitude,
});
