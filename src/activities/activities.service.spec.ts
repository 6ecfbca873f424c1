import { Test, TestingModule } from '@nestjs/testing';
import { Page } from '../common/pagination/page';
import { InList } from '../common/specification';
import { ActivitiesRepository } from './activities.repository';
import { ActivitiesService } from './activities.service';
import { Activity } from './activity';
import {
  ActivityMaximumNestingException,
  ActivityNotFoundException,
} from './activity.exceptions';
import { ActivityNestingValidator } from './activity-nesting.validator';

describe('ActivitiesService', () => {
  let service: ActivitiesService;

  const food: Activity = { activityId: 'food', parentId: null, name: 'Food' };
  const meat: Activity = { activityId: 'meat', parentId: 'food', name: 'Meat' };

  const mockRepository = {
    create: jest.fn(),
    update: jest.fn(),
    delete: jest.fn(),
    getById: jest.fn(),
    getPage: jest.fn(),
  };

  const mockNestingValidator = {
    validateNesting: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ActivitiesService,
        { provide: ActivitiesRepository, useValue: mockRepository },
        { provide: ActivityNestingValidator, useValue: mockNestingValidator },
      ],
    }).compile();

    service = module.get<ActivitiesService>(ActivitiesService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('create', () => {
    it('should create a root activity without nesting checks', async () => {
      mockRepository.create.mockResolvedValue(food);

      await expect(service.create(food)).resolves.toEqual(food);
      expect(mockNestingValidator.validateNesting).not.toHaveBeenCalled();
    });

    it('should validate the parent before creating a child', async () => {
      mockRepository.getById.mockResolvedValue(food);
      mockRepository.create.mockResolvedValue(meat);

      await service.create(meat);

      expect(mockRepository.getById).toHaveBeenCalledWith('food');
      expect(mockNestingValidator.validateNesting).toHaveBeenCalledWith('food');
    });

    it('should fail when the parent does not exist', async () => {
      mockRepository.getById.mockResolvedValue(null);

      await expect(service.create(meat)).rejects.toBeInstanceOf(ActivityNotFoundException);
      expect(mockRepository.create).not.toHaveBeenCalled();
    });

    it('should not write when nesting is too deep', async () => {
      mockRepository.getById.mockResolvedValue(food);
      mockNestingValidator.validateNesting.mockRejectedValueOnce(
        new ActivityMaximumNestingException(),
      );

      await expect(service.create(meat)).rejects.toBeInstanceOf(
        ActivityMaximumNestingException,
      );
      expect(mockRepository.create).not.toHaveBeenCalled();
    });
  });

  describe('update', () => {
    it('should pass its own id to the nesting check', async () => {
      mockRepository.getById.mockResolvedValue(food);
      mockNestingValidator.validateNesting.mockResolvedValue(undefined);
      mockRepository.update.mockResolvedValue(meat);

      await service.update(meat);

      expect(mockNestingValidator.validateNesting).toHaveBeenCalledWith('food', 'meat');
      expect(mockRepository.update).toHaveBeenCalledWith(meat);
    });
  });

  describe('getById', () => {
    it('should carry the missing id in the error', async () => {
      mockRepository.getById.mockResolvedValue(null);

      await expect(service.getById('missing')).rejects.toMatchObject({
        errorCode: 'ActivityNotFoundException',
        additionalInfo: { activityId: 'missing' },
      });
    });
  });

  describe('getPage', () => {
    it('should pass specifications to the repository', async () => {
      const page = new Page([food], 1, 1, 10);
      const specification = InList('id').newWithValue(['food']);
      mockRepository.getPage.mockResolvedValue(page);

      await expect(
        service.getPage({ page: 1, perPage: 10 }, [specification]),
      ).resolves.toBe(page);
      expect(mockRepository.getPage).toHaveBeenCalledWith(
        { page: 1, perPage: 10 },
        [specification],
        [],
      );
    });
  });

  describe('delete', () => {
    it('should delete an existing activity', async () => {
      mockRepository.getById.mockResolvedValue(food);

      await service.delete('food');

      expect(mockRepository.delete).toHaveBeenCalledWith('food');
    });

    it('should fail for an unknown activity', async () => {
      mockRepository.getById.mockResolvedValue(null);

      await expect(service.delete('missing')).rejects.toBeInstanceOf(
        ActivityNotFoundException,
      );
      expect(mockRepository.delete).not.toHaveBeenCalled();
    });
  });
});
