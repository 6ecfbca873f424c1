import { DomainValidationException } from '../exceptions/domain.exception';

export class InvalidCoordinateException extends DomainValidationException {
  constructor(field: 'latitude' | 'longitude', value: number) {
    const range = field === 'latitude' ? '-90 and 90' : '-180 and 180';
    super(`Invalid ${field}: ${value}. Must be between ${range} degrees`, {
      [field]: value,
    });
  }
}

export class InvalidPhoneNumberException extends DomainValidationException {
  constructor(phoneNumber: string) {
    super(
      `Invalid phone number: ${phoneNumber}. Must be in international format, e.g. '+1234567890'`,
      { phoneNumber },
    );
  }
}

export class InvalidCoordinateBoxException extends DomainValidationException {
  constructor(value: string) {
    super(
      `Invalid coordinate box: "${value}". Expected "minLat,minLon;maxLat,maxLon"`,
      { coords: value },
    );
  }
}
