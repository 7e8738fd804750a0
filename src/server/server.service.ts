import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/env.validation';
import { DockerService } from '../docker/docker.service';
import { ControlDto } from './dto/control.dto';
import { ServerStatusDto } from './dto/server.dto';

/** Controls the container the Minecraft server runs in. */
@Injectable()
export class ServerService {
  private readonly containerName: string;

  constructor(
    private readonly dockerService: DockerService,
    configService: ConfigService<EnvironmentVariables, true>,
  ) {
    this.containerName = configService.get('MC_DOCKER_NAME', { infer: true });
  }

  async control(control: ControlDto) {
    await this.dockerService.runAction(this.containerName, control.action);
    return { action: control.action, message: control.message ?? null };
  }

  async serverStatus() {
    const status = await this.dockerService.inspectState(this.containerName);
    return new ServerStatusDto(status);
  }
}
