import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SecretStore } from '../engine';

const DEFAULT_PREFIX = 'CI_SECRET_';

/**
 * Reads secret `docker_password` from `CI_SECRET_DOCKER_PASSWORD`
 * (prefix configurable with SECRET_ENV_PREFIX).
 */
@Injectable()
export class EnvSecretStore extends SecretStore {
  constructor(private readonly config: ConfigService) {
    super();
  }

  variableFor(name: string): string {
    const prefix = this.config.get<string>('SECRET_ENV_PREFIX') ?? DEFAULT_PREFIX;
    return prefix + name.toUpperCase().replace(/[^A-Z0-9_]/g, '_');
  }

  async resolve(name: string): Promise<string> {
    const variable = this.variableFor(name);
    const value = this.config.get<string>(variable);
    if (value === undefined) {
      throw new Error(`Secret '${name}' is not set (expected ${variable})`);
    }
    return value;
  }
}
