import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { PageResponse, toPageResponse } from '../common/pagination/page-response';
import { toPaginationInfo } from '../common/pagination/pagination-query.dto';
import { CreateOrganizationDto } from './dto/create-organization.dto';
import {
  OrganizationListQueryDto,
  toOrganizationFilters,
  toOrganizationSortSpecifications,
  toOrganizationSpecifications,
} from './dto/organization-list-query.dto';
import {
  OrganizationResponseDto,
  toOrganizationResponse,
} from './dto/organization-response.dto';
import {
  PatchOrganizationDto,
  UpdateOrganizationDto,
  applyOrganizationUpdate,
} from './dto/update-organization.dto';
import { createOrganization } from './organization';
import { OrganizationsService } from './organizations.service';

// Справочник организаций открыт без токена
@ApiTags('Organizations')
@Controller('organizations')
export class OrganizationsController {
  constructor(private readonly organizationsService: OrganizationsService) {}

  @Post()
  @ApiOperation({ summary: 'Создать организацию' })
  async create(@Body() dto: CreateOrganizationDto): Promise<OrganizationResponseDto> {
    const organization = await this.organizationsService.create(createOrganization(dto));
    return toOrganizationResponse(organization);
  }

  @Get()
  @ApiOperation({ summary: 'Поиск организаций по зданию, деятельности, названию и координатам' })
  async findAll(
    @Query() query: OrganizationListQueryDto,
  ): Promise<PageResponse<OrganizationResponseDto>> {
    const page = await this.organizationsService.getPage(
      toPaginationInfo(query),
      toOrganizationSpecifications(query),
      toOrganizationSortSpecifications(query),
      toOrganizationFilters(query),
    );
    return toPageResponse(page, toOrganizationResponse);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Получить организацию по ID' })
  async findOne(@Param('id', ParseUUIDPipe) id: string): Promise<OrganizationResponseDto> {
    return toOrganizationResponse(await this.organizationsService.getById(id));
  }

  @Put(':id')
  @ApiOperation({ summary: 'Обновить организацию' })
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateOrganizationDto,
  ): Promise<OrganizationResponseDto> {
    return this.save(id, dto);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Частично обновить организацию' })
  async patch(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: PatchOrganizationDto,
  ): Promise<OrganizationResponseDto> {
    return this.save(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Удалить организацию' })
  async remove(@Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.organizationsService.delete(id);
  }

  private async save(id: string, dto: PatchOrganizationDto): Promise<OrganizationResponseDto> {
    const organization = await this.organizationsService.getById(id);
    const saved = await this.organizationsService.update(
      applyOrganizationUpdate(organization, dto),
    );
    return toOrganizationResponse(saved);
  }
}
