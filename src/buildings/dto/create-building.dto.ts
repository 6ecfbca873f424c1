import { ApiProperty } from '@nestjs/swagger';
import * as classValidator from 'class-validator';

const { IsNotEmpty, IsNumber, IsString, Max, Min } = classValidator;

export class CreateBuildingDto {
  @ApiProperty({ example: 'г. Москва, ул. Ленина 1, офис 3' })
  @IsString()
  @IsNotEmpty()
  address!: string;

  @ApiProperty({ example: 55.7558, minimum: -90, maximum: 90 })
  @IsNumber()
  @Min(-90)
  @Max(90)
  latitude!: number;

  @ApiProperty({ example: 37.6173, minimum: -180, maximum: 180 })
  @IsNumber()
  @Min(-180)
  @Max(180)
  longitude!: number;
}
