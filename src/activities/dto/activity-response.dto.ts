import { ApiProperty } from '@nestjs/swagger';
import { Activity } from '../activity';

export class ActivityResponseDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty({ format: 'uuid', nullable: true, type: String })
  parentId!: string | null;

  @ApiProperty({ example: 'Food' })
  name!: string;
}

export const toActivityResponse = (activity: Activity): ActivityResponseDto => ({
  id: activity.activityId,
  parentId: activity.parentId,
  name: activity.name,
});
