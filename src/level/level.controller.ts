import { Controller, Get, Param } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { LevelDto } from './dto/level.dto';
import { LevelService } from './level.service';

@ApiTags('level')
@Controller()
export class LevelController {
  constructor(private readonly levelService: LevelService) {}

  @Get('levels')
  @ApiOkResponse({ type: [LevelDto] })
  async listLevels() {
    return await this.levelService.listLevels();
  }

  @Get('level/:levelName')
  @ApiOkResponse({ type: LevelDto })
  async getLevel(@Param('levelName') levelName: string) {
    return await this.levelService.readLevel(levelName);
  }
}
