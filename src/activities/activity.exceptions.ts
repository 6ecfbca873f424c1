import {
  DomainConflictException,
  EntityNotFoundException,
} from '../common/exceptions/domain.exception';
import { MAX_NESTING_LEVEL } from './activity';

export class ActivityNotFoundException extends EntityNotFoundException {
  constructor(activityId: string | readonly string[]) {
    const ids = typeof activityId === 'string' ? activityId : activityId.join(', ');
    super(`Activity ${ids} not found`, {
      activityId: typeof activityId === 'string' ? activityId : [...activityId],
    });
  }
}

export class ActivityMaximumNestingException extends DomainConflictException {
  constructor() {
    super(`Activity maximum nesting error: nesting level is limited to ${MAX_NESTING_LEVEL}`);
  }
}

export class ActivityCyclicParentException extends DomainConflictException {
  constructor(activityId: string, parentId: string) {
    super(`Activity ${activityId} cannot be nested under its own descendant ${parentId}`, {
      activityId,
      parentId,
    });
  }
}
