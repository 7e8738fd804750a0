import { plainToInstance } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsString,
  Matches,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  MC_DOCKER_NAME: string = 'mc-server';

  @IsString()
  @Matches(/^(unix|npipe|tcp|http|https|ssh):\/\/.+/, {
    message:
      'DOCKER_BASE_URL must use one of unix://, npipe://, tcp://, http://, https:// or ssh://',
  })
  DOCKER_BASE_URL: string = 'unix://var/run/docker.sock';

  @IsString()
  @IsNotEmpty()
  MC_ROOT: string = '/data';

  @IsString()
  APP_NAME: string = 'mc-controller-api';

  @IsString()
  @IsNotEmpty()
  APP_HOST: string = '0.0.0.0';

  @IsInt()
  @Min(1)
  @Max(65535)
  APP_PORT: number = 80;
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new Error(`Invalid environment: ${messages.join('; ')}`);
  }
  return validatedConfig;
}
