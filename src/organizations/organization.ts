import { randomUUID } from 'crypto';
import { PhoneNumber } from '../common/value-objects/phone-number';

export interface Organization {
  organizationId: string;
  name: string;
  phoneNumbers: PhoneNumber[];
  buildingId: string;
  activityIds: string[];
}

export interface OrganizationFields {
  name: string;
  phoneNumbers: readonly string[];
  buildingId: string;
  activityIds: readonly string[];
}

// Повтор id в списке дал бы конфликт первичного ключа связи
export const uniqueIds = (ids: readonly string[]): string[] => [...new Set(ids)];

export const createOrganization = (fields: OrganizationFields): Organization => ({
  organizationId: randomUUID(),
  name: fields.name,
  phoneNumbers: fields.phoneNumbers.map((number) => new PhoneNumber(number)),
  buildingId: fields.buildingId,
  activityIds: uniqueIds(fields.activityIds),
});
