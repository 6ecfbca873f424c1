import { PartialType } from '@nestjs/swagger';
import { PhoneNumber } from '../../common/value-objects/phone-number';
import { Organization } from '../organization';
import { CreateOrganizationDto } from './create-organization.dto';

export class UpdateOrganizationDto extends CreateOrganizationDto {}

export class PatchOrganizationDto extends PartialType(CreateOrganizationDto) {}

export const applyOrganizationUpdate = (
  organization: Organization,
  dto: PatchOrganizationDto,
): Organization => ({
  ...organization,
  name: dto.name ?? organization.name,
  buildingId: dto.buildingId ?? organization.buildingId,
  phoneNumbers: dto.phoneNumbers
    ? dto.phoneNumbers.map((number) => new PhoneNumber(number))
    : organization.phoneNumbers,
  activityIds: dto.activityIds ?? organization.activityIds,
});
