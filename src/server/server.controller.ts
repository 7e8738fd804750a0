import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import {
  ApiAcceptedResponse,
  ApiBody,
  ApiOkResponse,
  ApiTags,
} from '@nestjs/swagger';
import { ControlDto } from './dto/control.dto';
import { ServerStatusDto } from './dto/server.dto';
import { ServerService } from './server.service';

@ApiTags('server')
@Controller()
export class ServerController {
  constructor(private readonly serverService: ServerService) {}

  @Post('control')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiBody({
    schema: {
      type: 'object',
      required: ['control'],
      properties: { control: { $ref: '#/components/schemas/ControlDto' } },
    },
  })
  @ApiAcceptedResponse({ type: ControlDto })
  async control(@Body('control') control: ControlDto) {
    return await this.serverService.control(control);
  }

  @Get('status')
  @ApiOkResponse({ type: ServerStatusDto })
  async getServerStatus() {
    return await this.serverService.serverStatus();
  }
}
