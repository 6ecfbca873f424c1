import { EntityNotFoundException } from '../common/exceptions/domain.exception';

export class OrganizationNotFoundException extends EntityNotFoundException {
  constructor(organizationId: string) {
    super(`Organization ${organizationId} not found`, { organizationId });
  }
}
