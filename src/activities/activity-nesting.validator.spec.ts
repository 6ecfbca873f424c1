import { Test, TestingModule } from '@nestjs/testing';
import { ActivitiesRepository } from './activities.repository';
import { Activity } from './activity';
import {
  ActivityCyclicParentException,
  ActivityMaximumNestingException,
} from './activity.exceptions';
import { ActivityNestingValidator } from './activity-nesting.validator';

describe('ActivityNestingValidator', () => {
  let validator: ActivityNestingValidator;

  // root <- child <- grandchild
  const tree: Record<string, Activity> = {
    root: { activityId: 'root', parentId: null, name: 'Food' },
    child: { activityId: 'child', parentId: 'root', name: 'Meat' },
    grandchild: { activityId: 'grandchild', parentId: 'child', name: 'Beef' },
  };

  const mockRepository = {
    getById: jest.fn(async (id: string) => tree[id] ?? null),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ActivityNestingValidator,
        { provide: ActivitiesRepository, useValue: mockRepository },
      ],
    }).compile();

    validator = module.get<ActivityNestingValidator>(ActivityNestingValidator);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should allow a child of a root', async () => {
    await expect(validator.validateNesting('root')).resolves.toBeUndefined();
    expect(mockRepository.getById).toHaveBeenCalledTimes(1);
  });

  it('should allow the third level', async () => {
    await expect(validator.validateNesting('child')).resolves.toBeUndefined();
    expect(mockRepository.getById).toHaveBeenCalledTimes(2);
  });

  it('should reject a fourth level', async () => {
    await expect(validator.validateNesting('grandchild')).rejects.toBeInstanceOf(
      ActivityMaximumNestingException,
    );
  });

  it('should reject an activity as its own parent', async () => {
    await expect(validator.validateNesting('child', 'child')).rejects.toBeInstanceOf(
      ActivityCyclicParentException,
    );
    expect(mockRepository.getById).not.toHaveBeenCalled();
  });

  it('should reject a descendant chosen as parent', async () => {
    await expect(validator.validateNesting('grandchild', 'child')).rejects.toBeInstanceOf(
      ActivityCyclicParentException,
    );
  });

  it('should allow moving a node under an unrelated root', async () => {
    await expect(validator.validateNesting('root', 'grandchild')).resolves.toBeUndefined();
  });
});
