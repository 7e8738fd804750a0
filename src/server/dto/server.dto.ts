import { ApiProperty } from '@nestjs/swagger';
import {
  CONTAINER_STATUSES,
  ContainerStatus,
} from '../../docker/dto/docker.dto';

export class ServerStatusDto {
  @ApiProperty({ enum: [...CONTAINER_STATUSES] })
  status: ContainerStatus;

  constructor(status: ContainerStatus) {
    this.status = status;
  }
}
