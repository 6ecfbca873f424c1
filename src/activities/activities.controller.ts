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
import { toPaginationInfo } from '../common/pagination/pagination-query.dto';
import { PageResponse, toPageResponse } from '../common/pagination/page-response';
import { ActivitiesService } from './activities.service';
import { createActivity } from './activity';
import {
  ActivityListQueryDto,
  toActivitySortSpecifications,
  toActivitySpecifications,
} from './dto/activity-list-query.dto';
import { ActivityResponseDto, toActivityResponse } from './dto/activity-response.dto';
import { CreateActivityDto } from './dto/create-activity.dto';
import {
  PatchActivityDto,
  UpdateActivityDto,
  applyActivityPatch,
  applyActivityUpdate,
} from './dto/update-activity.dto';

@ApiTags('Activities')
@Controller('activities')
@UseGuards(TokenAuthGuard)
@ApiBearerAuth()
export class ActivitiesController {
  constructor(private readonly activitiesService: ActivitiesService) {}

  @Post()
  @ApiOperation({ summary: 'Создать вид деятельности' })
  async create(@Body() dto: CreateActivityDto): Promise<ActivityResponseDto> {
    const activity = await this.activitiesService.create(createActivity(dto));
    return toActivityResponse(activity);
  }

  @Get()
  @ApiOperation({ summary: 'Список видов деятельности с фильтрами и пагинацией' })
  async findAll(
    @Query() query: ActivityListQueryDto,
  ): Promise<PageResponse<ActivityResponseDto>> {
    const page = await this.activitiesService.getPage(
      toPaginationInfo(query),
      toActivitySpecifications(query),
      toActivitySortSpecifications(query),
    );
    return toPageResponse(page, toActivityResponse);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Получить вид деятельности по ID' })
  async findOne(@Param('id', ParseUUIDPipe) id: string): Promise<ActivityResponseDto> {
    return toActivityResponse(await this.activitiesService.getById(id));
  }

  @Put(':id')
  @ApiOperation({ summary: 'Обновить вид деятельности' })
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateActivityDto,
  ): Promise<ActivityResponseDto> {
    const activity = await this.activitiesService.getById(id);
    const saved = await this.activitiesService.update(applyActivityUpdate(activity, dto));
    return toActivityResponse(saved);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Частично обновить вид деятельности' })
  async patch(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: PatchActivityDto,
  ): Promise<ActivityResponseDto> {
    const activity = await this.activitiesService.getById(id);
    const saved = await this.activitiesService.update(applyActivityPatch(activity, dto));
    return toActivityResponse(saved);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Удалить вид деятельности вместе с потомками' })
  async remove(@Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.activitiesService.delete(id);
  }
}
