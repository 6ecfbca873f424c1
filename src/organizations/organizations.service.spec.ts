import { Test, TestingModule } from '@nestjs/testing';
import { ActivitiesRepository } from '../activities/activities.repository';
import { ActivityNotFoundException } from '../activities/activity.exceptions';
import { BuildingsRepository } from '../buildings/buildings.repository';
import { BuildingNotFoundException } from '../buildings/building.exceptions';
import { NO_PAGINATION } from '../common/pagination/page';
import { Coordinate } from '../common/value-objects/coordinate';
import { PhoneNumber } from '../common/value-objects/phone-number';
import { Organization } from './organization';
import { OrganizationActivitiesRepository } from './organization-activities.repository';
import { OrganizationNotFoundException } from './organization.exceptions';
import { OrganizationsRepository } from './organizations.repository';
import { OrganizationsService } from './organizations.service';

describe('OrganizationsService', () => {
  let service: OrganizationsService;

  const building = { buildingId: 'b-1', address: 'Lenina 1', coordinate: new Coordinate(55, 37) };

  const organization: Organization = {
    organizationId: 'org-1',
    name: 'Horns and Hooves',
    phoneNumbers: [new PhoneNumber('+79998887766')],
    buildingId: 'b-1',
    activityIds: ['x', 'y'],
  };

  const mockOrganizationsRepository = {
    create: jest.fn(),
    update: jest.fn(),
    delete: jest.fn(),
    getById: jest.fn(),
    getPage: jest.fn(),
  };

  const mockLinksRepository = {
    create: jest.fn(),
    delete: jest.fn(),
  };

  const mockBuildingsRepository = {
    getById: jest.fn(),
  };

  const mockActivitiesRepository = {
    getCount: jest.fn(),
    getList: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        OrganizationsService,
        { provide: OrganizationsRepository, useValue: mockOrganizationsRepository },
        { provide: OrganizationActivitiesRepository, useValue: mockLinksRepository },
        { provide: BuildingsRepository, useValue: mockBuildingsRepository },
        { provide: ActivitiesRepository, useValue: mockActivitiesRepository },
      ],
    }).compile();

    service = module.get<OrganizationsService>(OrganizationsService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('create', () => {
    it('should persist the row and then the activity links', async () => {
      mockBuildingsRepository.getById.mockResolvedValue(building);
      mockActivitiesRepository.getCount.mockResolvedValue(2);
      mockOrganizationsRepository.create.mockResolvedValue({ ...organization, activityIds: [] });

      const created = await service.create(organization);

      expect(created.activityIds).toEqual(['x', 'y']);
      expect(mockLinksRepository.create).toHaveBeenCalledWith('org-1', ['x', 'y']);
      expect(mockActivitiesRepository.getList).not.toHaveBeenCalled();
    });

    it('should check activity ids with a single inList specification', async () => {
      mockBuildingsRepository.getById.mockResolvedValue(building);
      mockActivitiesRepository.getCount.mockResolvedValue(2);
      mockOrganizationsRepository.create.mockResolvedValue(organization);

      await service.create(organization);

      const [[specifications]] = mockActivitiesRepository.getCount.mock.calls;
      expect(specifications).toHaveLength(1);
      expect(specifications[0].kind).toBe('inList');
      expect(specifications[0].value).toEqual(['x', 'y']);
    });

    it('should fail without writes when the building is missing', async () => {
      mockBuildingsRepository.getById.mockResolvedValue(null);

      await expect(service.create(organization)).rejects.toBeInstanceOf(
        BuildingNotFoundException,
      );
      expect(mockOrganizationsRepository.create).not.toHaveBeenCalled();
      expect(mockLinksRepository.create).not.toHaveBeenCalled();
    });

    it('should list exactly the missing activity ids', async () => {
      mockBuildingsRepository.getById.mockResolvedValue(building);
      mockActivitiesRepository.getCount.mockResolvedValue(1);
      mockActivitiesRepository.getList.mockResolvedValue([
        { activityId: 'x', parentId: null, name: 'Food' },
      ]);

      const error = await service.create(organization).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ActivityNotFoundException);
      expect(error).toMatchObject({
        message: 'Activity y not found',
        additionalInfo: { activityId: ['y'] },
      });
      expect(mockActivitiesRepository.getList.mock.calls[0][0]).toBe(NO_PAGINATION);
      expect(mockOrganizationsRepository.create).not.toHaveBeenCalled();
    });

    it('should skip activity checks and links for an empty list', async () => {
      mockBuildingsRepository.getById.mockResolvedValue(building);
      mockOrganizationsRepository.create.mockResolvedValue({ ...organization, activityIds: [] });

      const created = await service.create({ ...organization, activityIds: [] });

      expect(created.activityIds).toEqual([]);
      expect(mockActivitiesRepository.getCount).not.toHaveBeenCalled();
      expect(mockLinksRepository.create).toHaveBeenCalledWith('org-1', []);
    });
  });

  describe('update', () => {
    it('should replace the activity links', async () => {
      const changed = { ...organization, activityIds: ['y', 'z'] };
      mockBuildingsRepository.getById.mockResolvedValue(building);
      mockActivitiesRepository.getCount.mockResolvedValue(2);
      mockOrganizationsRepository.update.mockResolvedValue(organization);

      const saved = await service.update(changed);

      expect(mockLinksRepository.delete).toHaveBeenCalledWith('org-1');
      expect(mockLinksRepository.create).toHaveBeenCalledWith('org-1', ['y', 'z']);
      expect(mockLinksRepository.delete.mock.invocationCallOrder[0]).toBeLessThan(
        mockLinksRepository.create.mock.invocationCallOrder[0],
      );
      expect(saved.activityIds).toEqual(['y', 'z']);
    });

    it('should clear the links when the new list is empty', async () => {
      mockBuildingsRepository.getById.mockResolvedValue(building);
      mockOrganizationsRepository.update.mockResolvedValue(organization);

      const saved = await service.update({ ...organization, activityIds: [] });

      expect(mockLinksRepository.delete).toHaveBeenCalledWith('org-1');
      expect(saved.activityIds).toEqual([]);
    });

    it('should not write when an activity is missing', async () => {
      mockBuildingsRepository.getById.mockResolvedValue(building);
      mockActivitiesRepository.getCount.mockResolvedValue(0);
      mockActivitiesRepository.getList.mockResolvedValue([]);

      await expect(service.update(organization)).rejects.toBeInstanceOf(
        ActivityNotFoundException,
      );
      expect(mockOrganizationsRepository.update).not.toHaveBeenCalled();
      expect(mockLinksRepository.delete).not.toHaveBeenCalled();
    });
  });

  describe('delete', () => {
    it('should remove links before the organization', async () => {
      mockOrganizationsRepository.getById.mockResolvedValue(organization);

      await service.delete('org-1');

      expect(mockLinksRepository.delete).toHaveBeenCalledWith('org-1');
      expect(mockOrganizationsRepository.delete).toHaveBeenCalledWith('org-1');
      expect(mockLinksRepository.delete.mock.invocationCallOrder[0]).toBeLessThan(
        mockOrganizationsRepository.delete.mock.invocationCallOrder[0],
      );
    });

    it('should fail for an unknown organization', async () => {
      mockOrganizationsRepository.getById.mockResolvedValue(null);

      await expect(service.delete('missing')).rejects.toBeInstanceOf(
        OrganizationNotFoundException,
      );
      expect(mockOrganizationsRepository.delete).not.toHaveBeenCalled();
    });
  });
});
