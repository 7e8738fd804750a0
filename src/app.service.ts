import { Injectable, Logger } from '@nestjs/common';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';

export const UNKNOWN_VERSION = '???';

@Injectable()
export class AppService {
  private readonly logger = new Logger(AppService.name);
  private readonly version: string;

  // Loaded when the provider is created so the API docs can use it before init.
  constructor() {
    this.version = readPackageVersion(join(process.cwd(), 'package.json'));
    this.logger.log(`Version ${this.version}`);
  }

  getVersion() {
    return this.version;
  }
}

/** Reads `version` from a package manifest, `???` when it cannot. */
export function readPackageVersion(manifestPath: string) {
  try {
    const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf8'));
    if (
      typeof manifest === 'object' &&
      manifest !== null &&
      'version' in manifest &&
      typeof manifest.version === 'string'
    ) {
      return manifest.version;
    }
  } catch {
    return UNKNOWN_VERSION;
  }
  return UNKNOWN_VERSION;
}
