import {
  BadRequestException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import type { Dirent } from 'node:fs';
import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { EnvironmentVariables } from '../config/env.validation';
import { LevelDto, PackDto } from './dto/level.dto';

const BEHAVIOR_PACKS_FILE = 'world_behavior_packs.json';
const RESOURCE_PACKS_FILE = 'world_resource_packs.json';

@Injectable()
export class LevelService {
  private readonly logger = new Logger(LevelService.name);
  private readonly levelsDir: string;

  constructor(configService: ConfigService<EnvironmentVariables, true>) {
    const root = configService.get('MC_ROOT', { infer: true });
    this.levelsDir = join(root, 'worlds');
  }

  async listLevels() {
    const entries: Dirent[] = await readdir(this.levelsDir, {
      withFileTypes: true,
    }).catch((error: unknown) => {
      if (errorCode(error) === 'ENOENT') return [];
      throw error;
    });

    const names = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();

    const levels: LevelDto[] = [];
    for (const name of names) {
      levels.push(await this.readLevelDir(name));
    }
    return levels;
  }

  async readLevel(levelName: string) {
    if (!isPlainName(levelName)) {
      throw new BadRequestException(`Invalid level name: ${levelName}`);
    }

    return await this.readLevelDir(levelName);
  }

  private async readLevelDir(levelName: string) {
    const levelDir = join(this.levelsDir, levelName);
    const isDirectory = await stat(levelDir).then(
      (stats) => stats.isDirectory(),
      (error: unknown) => {
        const code = errorCode(error);
        if (code === 'ENOENT' || code === 'ENOTDIR') return false;
        throw this.unreadableLevel(levelDir, error);
      },
    );
    if (!isDirectory) {
      throw new NotFoundException('That level was not found!');
    }

    const [behaviorPacks, resourcePacks] = await Promise.all([
      this.readPacks(join(levelDir, BEHAVIOR_PACKS_FILE)),
      this.readPacks(join(levelDir, RESOURCE_PACKS_FILE)),
    ]);
    return new LevelDto(levelName, behaviorPacks, resourcePacks);
  }

  private async readPacks(filePath: string): Promise<PackDto[]> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return [];
      throw this.invalidLevelData(filePath, error);
    }

    let entries: unknown;
    try {
      entries = JSON.parse(content);
    } catch (error) {
      throw this.invalidLevelData(filePath, error);
    }
    if (!Array.isArray(entries)) {
      throw this.invalidLevelData(filePath, 'expected a JSON array');
    }

    return entries.map((entry: unknown, index) => {
      const pack = toPack(entry);
      const errors: ValidationError[] = pack ? validateSync(pack) : [];
      if (!pack || errors.length > 0) {
        const reason = errors
          .flatMap((error) => Object.values(error.constraints ?? {}))
          .join('; ');
        throw this.invalidLevelData(
          filePath,
          `entry ${index} is not a pack${reason ? `: ${reason}` : ''}`,
        );
      }
      return pack;
    });
  }

  private unreadableLevel(levelDir: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    this.logger.error(`Cannot read level ${levelDir}: ${reason}`);
    return new InternalServerErrorException('Cannot read level');
  }

  private invalidLevelData(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    this.logger.error(`Invalid level data in ${filePath}: ${reason}`);
    return new InternalServerErrorException('Invalid level data');
  }
}

/** Bedrock names the pack identifier `pack_id`; it is reported as `uuid`. */
function toPack(entry: unknown): PackDto | undefined {
  if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
    return undefined;
  }
  const fields: Record<string, unknown> = Object.fromEntries(
    Object.entries(entry),
  );
  const { name, can_be_redownloaded, uuid, pack_id, version } = fields;
  const plain: Record<string, unknown> = { uuid: uuid ?? pack_id, version };
  if (name !== undefined) plain.name = name;
  if (can_be_redownloaded !== undefined) {
    plain.can_be_redownloaded = can_be_redownloaded;
  }
  return plainToInstance(PackDto, plain);
}

/** A single path segment: no separator of the host platform, not `.` or `..`. */
function isPlainName(name: string) {
  return (
    name.length > 0 &&
    name !== '.' &&
    name !== '..' &&
    name === basename(name) &&
    !name.includes('\0')
  );
}

function errorCode(error: unknown) {
  return typeof error === 'object' && error !== null && 'code' in error
    ? error.code
    : undefined;
}
