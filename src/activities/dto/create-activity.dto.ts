import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import * as classValidator from 'class-validator';

const { IsNotEmpty, IsOptional, IsString, IsUUID, MaxLength } = classValidator;

export class CreateActivityDto {
  @ApiProperty({ example: 'Food', maxLength: 128 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  name!: string;

  @ApiPropertyOptional({
    example: '0b9c1c5e-5c1f-4b8e-9a57-4c1d2f0a8e11',
    nullable: true,
    type: String,
    description: 'Родительский вид деятельности',
  })
  @IsOptional()
  @IsUUID()
  parentId?: string | null;
}
