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
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { TokenAuthGuard } from '../auth/guards/token-auth.guard';
import { PageResponse, toPageResponse } from '../common/pagination/page-response';
import { toPaginationInfo } from '../common/pagination/pagination-query.dto';
import { createBuilding } from './building';
import { BuildingsService } from './buildings.service';
import {
  BuildingListQueryDto,
  toBuildingSortSpecifications,
  toBuildingSpecifications,
} from './dto/building-list-query.dto';
import { BuildingResponseDto, toBuildingResponse } from './dto/building-response.dto';
import { CreateBuildingDto } from './dto/create-building.dto';
import {
  PatchBuildingDto,
  UpdateBuildingDto,
  applyBuildingUpdate,
} from './dto/update-building.dto';

@ApiTags('Buildings')
@Controller('buildings')
@UseGuards(TokenAuthGuard)
@ApiBearerAuth()
export class BuildingsController {
  constructor(private readonly buildingsService: BuildingsService) {}

  @Post()
  @ApiOperation({ summary: 'Создать здание' })
  async create(@Body() dto: CreateBuildingDto): Promise<BuildingResponseDto> {
    return toBuildingResponse(await this.buildingsService.create(createBuilding(dto)));
  }

  @Get()
  @ApiOperation({ summary: 'Список зданий с фильтрами и пагинацией' })
  async findAll(
    @Query() query: BuildingListQueryDto,
  ): Promise<PageResponse<BuildingResponseDto>> {
    const page = await this.buildingsService.getPage(
      toPaginationInfo(query),
      toBuildingSpecifications(query),
      toBuildingSortSpecifications(query),
    );
    return toPageResponse(page, toBuildingResponse);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Получить здание по ID' })
  async findOne(@Param('id', ParseUUIDPipe) id: string): Promise<BuildingResponseDto> {
    return toBuildingResponse(await this.buildingsService.getById(id));
  }

  @Put(':id')
  @ApiOperation({ summary: 'Обновить здание' })
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateBuildingDto,
  ): Promise<BuildingResponseDto> {
    return this.save(id, dto);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Частично обновить здание' })
  async patch(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: PatchBuildingDto,
  ): Promise<BuildingResponseDto> {
    return this.save(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Удалить здание' })
  async remove(@Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.buildingsService.delete(id);
  }

  private async save(id: string, dto: PatchBuildingDto): Promise<BuildingResponseDto> {
    const building = await this.buildingsService.getById(id);
    const saved = await this.buildingsService.update(applyBuildingUpdate(building, dto));
    return toBuildingResponse(saved);
  }
}
