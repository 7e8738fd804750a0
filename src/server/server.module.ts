import { Module } from '@nestjs/common';
import { DockerModule } from '../docker/docker.module';
import { ServerController } from './server.controller';
import { ServerService } from './server.service';

@Module({
  imports: [DockerModule],
  controllers: [ServerController],
  providers: [ServerService],
})
export class ServerModule {}
