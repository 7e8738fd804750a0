import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsOptional, IsString } from 'class-validator';
import {
  CONTAINER_ACTIONS,
  ContainerAction,
} from '../../docker/dto/docker.dto';

export class ControlDto {
  @ApiProperty({ enum: [...CONTAINER_ACTIONS] })
  @IsIn([...CONTAINER_ACTIONS])
  action!: ContainerAction;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  message?: string | null;
}
