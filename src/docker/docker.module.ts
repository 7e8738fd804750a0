import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Docker from 'dockerode';
import { EnvironmentVariables } from '../config/env.validation';
import { DOCKER_CLIENT } from './docker.constants';
import { parseDockerHost } from './docker-host';
import { DockerService } from './docker.service';
import { ContainerEngine } from './dto/docker.dto';

@Module({
  providers: [
    {
      provide: DOCKER_CLIENT,
      inject: [ConfigService],
      useFactory: (
        configService: ConfigService<EnvironmentVariables, true>,
      ): ContainerEngine => {
        const baseUrl = configService.get('DOCKER_BASE_URL', { infer: true });
        new Logger(DockerModule.name).log(`Docker Engine at ${baseUrl}`);
        return new Docker(parseDockerHost(baseUrl));
      },
    },
    DockerService,
  ],
  exports: [DockerService],
})
export class DockerModule {}
