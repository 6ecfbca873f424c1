import {
  InvalidCoordinateBoxException,
  InvalidCoordinateException,
} from './value-object.exceptions';

export class Coordinate {
  readonly latitude: number;
  readonly longitude: number;

  constructor(latitude: number, longitude: number) {
    if (!(latitude >= -90 && latitude <= 90)) {
      throw new InvalidCoordinateException('latitude', latitude);
    }
    if (!(longitude >= -180 && longitude <= 180)) {
      throw new InvalidCoordinateException('longitude', longitude);
    }
    this.latitude = latitude;
    this.longitude = longitude;
  }

  toString(): string {
    return `(${this.latitude.toFixed(6)}, ${this.longitude.toFixed(6)})`;
  }
}

export interface CoordinateBox {
  min: Coordinate;
  max: Coordinate;
}

const BOX_NUMBER = /^\s*-?\d+(\.\d+)?\s*$/;

/**
 * Разбирает строку `minLat,minLon;maxLat,maxLon`. Каждый угол
 * проверяется как Coordinate.
 */
export function parseCoordinateBox(value: string): CoordinateBox {
  const corners = value.split(';');
  if (corners.length !== 2) {
    throw new InvalidCoordinateBoxException(value);
  }

  const [min, max] = corners.map((corner) => {
    const parts = corner.split(',');
    if (parts.length !== 2 || !parts.every((part) => BOX_NUMBER.test(part))) {
      throw new InvalidCoordinateBoxException(value);
    }
    return new Coordinate(Number(parts[0]), Number(parts[1]));
  });

  return { min, max };
}
