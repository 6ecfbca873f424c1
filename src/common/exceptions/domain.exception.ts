import { HttpException, HttpStatus } from '@nestjs/common';

export type AdditionalInfo = Record<string, unknown>;

/**
 * Ошибка предметной области. Сообщение и `additionalInfo` публичны
 * и уходят клиенту как есть, `errorCode` совпадает с именем класса.
 */
export abstract class DomainException extends HttpException {
  constructor(
    detail: string,
    status: HttpStatus,
    readonly additionalInfo: AdditionalInfo = {},
  ) {
    super(detail, status);
    this.name = new.target.name;
  }

  get errorCode(): string {
    return this.name;
  }

  get detail(): string {
    return this.message;
  }
}

export abstract class EntityNotFoundException extends DomainException {
  constructor(detail: string, additionalInfo: AdditionalInfo) {
    super(detail, HttpStatus.NOT_FOUND, additionalInfo);
  }
}

export abstract class DomainConflictException extends DomainException {
  constructor(detail: string, additionalInfo: AdditionalInfo = {}) {
    super(detail, HttpStatus.CONFLICT, additionalInfo);
  }
}

export abstract class DomainValidationException extends DomainException {
  constructor(detail: string, additionalInfo: AdditionalInfo = {}) {
    super(detail, HttpStatus.UNPROCESSABLE_ENTITY, additionalInfo);
  }
}

export class UnknownException extends DomainException {
  constructor() {
    super('Internal server error', HttpStatus.INTERNAL_SERVER_ERROR);
  }
}
