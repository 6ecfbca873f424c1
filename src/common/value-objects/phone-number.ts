import { InvalidPhoneNumberException } from './value-object.exceptions';

const PHONE_NUMBER_PATTERN = /^\+\d{6,15}$/;

/** Номер в международном формате: `+` и от 6 до 15 цифр */
export class PhoneNumber {
  constructor(readonly number: string) {
    if (!PHONE_NUMBER_PATTERN.test(number)) {
      throw new InvalidPhoneNumberException(number);
    }
  }

  valueOf(): string {
    return this.number;
  }

  toString(): string {
    return this.number;
  }

  toJSON(): string {
    return this.number;
  }
}
