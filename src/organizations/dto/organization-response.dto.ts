import { ApiProperty } from '@nestjs/swagger';
import { Organization } from '../organization';

export class OrganizationResponseDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty()
  name!: string;

  @ApiProperty({ type: [String], example: ['+79998887766'] })
  phoneNumbers!: string[];

  @ApiProperty({ format: 'uuid' })
  buildingId!: string;

  @ApiProperty({ type: [String] })
  activityIds!: string[];
}

export const toOrganizationResponse = (
  organization: Organization,
): OrganizationResponseDto => ({
  id: organization.organizationId,
  name: organization.name,
  phoneNumbers: organization.phoneNumbers.map((phone) => phone.number),
  buildingId: organization.buildingId,
  activityIds: organization.activityIds,
});
