import { randomUUID } from 'crypto';
import { Coordinate } from '../common/value-objects/coordinate';

export interface Building {
  buildingId: string;
  address: string;
  coordinate: Coordinate;
}

export const createBuilding = (fields: {
  address: string;
  latitude: number;
  longitude: number;
}): Building => ({
  buildingId: randomUUID(),
  address: fields.address,
  coordinate: new Coordinate(fields.latitude, fields.longitude),
});
