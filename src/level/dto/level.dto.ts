import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  IsUUID,
} from 'class-validator';

/** An entry of `world_behavior_packs.json` or `world_resource_packs.json`. */
export class PackDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  name?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsBoolean()
  can_be_redownloaded?: boolean;

  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  uuid!: string;

  @ApiProperty({ type: [Number], minItems: 3, maxItems: 3 })
  @IsArray()
  @ArrayMinSize(3)
  @ArrayMaxSize(3)
  @IsInt({ each: true })
  version!: number[];
}

export class LevelDto {
  @ApiProperty()
  name: string;

  @ApiProperty({ type: [PackDto] })
  behavior_packs: PackDto[];

  @ApiProperty({ type: [PackDto] })
  resource_packs: PackDto[];

  constructor(
    name: string,
    behaviorPacks: PackDto[],
    resourcePacks: PackDto[],
  ) {
    this.name = name;
    this.behavior_packs = behaviorPacks;
    this.resource_packs = resourcePacks;
  }
}
