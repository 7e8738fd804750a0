import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { validate } from './config/env.validation';
import { LevelModule } from './level/level.module';
import { ServerModule } from './server/server.module';

const modules = [ServerModule, LevelModule];

export const global_modules = [
  ConfigModule.forRoot({ isGlobal: true, envFilePath: ['.env'], validate }),
];

@Module({
  imports: [...global_modules, ...modules],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
