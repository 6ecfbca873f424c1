import { ApiProperty } from '@nestjs/swagger';
import * as classValidator from 'class-validator';

const { ArrayUnique, IsArray, IsNotEmpty, IsString, IsUUID, MaxLength } = classValidator;

export class CreateOrganizationDto {
  @ApiProperty({ example: 'ООО "Рога и Копыта"', maxLength: 255 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @ApiProperty({ example: ['+79998887766'], type: [String] })
  @IsArray()
  @IsString({ each: true })
  phoneNumbers!: string[];

  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  buildingId!: string;

  @ApiProperty({ type: [String], description: 'ID видов деятельности' })
  @IsArray()
  @ArrayUnique()
  @IsUUID('all', { each: true })
  activityIds!: string[];
}
