import { ApiProperty } from '@nestjs/swagger';

export class VersionDto {
  @ApiProperty({ example: '0.2.0' })
  version: string;

  constructor(version: string) {
    this.version = version;
  }
}
