import {
  BadGatewayException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { DOCKER_CLIENT } from './docker.constants';
import {
  CONTAINER_STATUSES,
  ContainerAction,
  ContainerEngine,
  ContainerStatus,
} from './dto/docker.dto';

const NOT_MODIFIED = 304;
const NOT_FOUND = 404;

@Injectable()
export class DockerService {
  private readonly logger = new Logger(DockerService.name);

  constructor(
    @Inject(DOCKER_CLIENT) private readonly docker: ContainerEngine,
  ) {}

  async inspectState(containerName: string): Promise<ContainerStatus> {
    try {
      const info = await this.docker.getContainer(containerName).inspect();
      const status = CONTAINER_STATUSES.find((s) => s === info.State.Status);
      if (!status) {
        throw new BadGatewayException(
          `Unknown container status: ${info.State.Status}`,
        );
      }
      return status;
    } catch (error) {
      throw this.toHttpException(error, containerName);
    }
  }

  async runAction(containerName: string, action: ContainerAction) {
    const container = this.docker.getContainer(containerName);
    this.logger.log(`${action} ${containerName}`);
    try {
      switch (action) {
        case 'start':
          await container.start();
          break;
        case 'stop':
          await container.stop();
          break;
        case 'restart':
          await container.restart();
          break;
      }
    } catch (error) {
      // 304: the container is already in the requested state.
      if (statusCodeOf(error) === NOT_MODIFIED) return;
      throw this.toHttpException(error, containerName);
    }
  }

  private toHttpException(error: unknown, containerName: string) {
    if (error instanceof BadGatewayException) return error;
    if (statusCodeOf(error) === NOT_FOUND) {
      return new NotFoundException(`No such container: ${containerName}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Docker Engine request failed: ${message}`);
    return new BadGatewayException(`Docker Engine error: ${message}`);
  }
}

function statusCodeOf(error: unknown): number | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  ) {
    return error.statusCode;
  }
  return undefined;
}
