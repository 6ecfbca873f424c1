import { Injectable, Logger } from '@nestjs/common';
import { Page, PaginationInfo } from '../common/pagination/page';
import { AnyFieldSpecification, SortSpecification } from '../common/specification';
import { Building } from './building';
import { BuildingNotFoundException } from './building.exceptions';
import { BuildingsRepository } from './buildings.repository';

@Injectable()
export class BuildingsService {
  private readonly logger = new Logger(BuildingsService.name);

  constructor(private readonly buildingsRepository: BuildingsRepository) {}

  async create(building: Building): Promise<Building> {
    const created = await this.buildingsRepository.create(building);
    this.logger.log(`Building ${created.buildingId} created at ${created.coordinate}`);
    return created;
  }

  async getPage(
    pagination: PaginationInfo,
    specifications: readonly AnyFieldSpecification[] = [],
    sortSpecifications: readonly SortSpecification[] = [],
  ): Promise<Page<Building>> {
    return this.buildingsRepository.getPage(pagination, specifications, sortSpecifications);
  }

  async getById(buildingId: string): Promise<Building> {
    const building = await this.buildingsRepository.getById(buildingId);
    if (!building) {
      throw new BuildingNotFoundException(buildingId);
    }
    return building;
  }

  async update(building: Building): Promise<Building> {
    return this.buildingsRepository.update(building);
  }

  // Здание с организациями удалить нельзя: FK с RESTRICT
  async delete(buildingId: string): Promise<void> {
    const building = await this.getById(buildingId);
    await this.buildingsRepository.delete(building.buildingId);
    this.logger.log(`Building ${buildingId} deleted`);
  }
}
