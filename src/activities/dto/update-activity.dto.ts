import { PartialType } from '@nestjs/swagger';
import { Activity } from '../activity';
import { CreateActivityDto } from './create-activity.dto';

/** PUT: все поля, отсутствующий parentId делает активность корневой */
export class UpdateActivityDto extends CreateActivityDto {}

/** PATCH: только переданные поля */
export class PatchActivityDto extends PartialType(CreateActivityDto) {}

export const applyActivityUpdate = (
  activity: Activity,
  dto: UpdateActivityDto,
): Activity => ({
  ...activity,
  name: dto.name,
  parentId: dto.parentId ?? null,
});

export const applyActivityPatch = (
  activity: Activity,
  dto: PatchActivityDto,
): Activity => ({
  ...activity,
  name: dto.name ?? activity.name,
  parentId: dto.parentId === undefined ? activity.parentId : dto.parentId,
});
