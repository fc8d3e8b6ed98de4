import { Module } from '@nestjs/common';
import { ExecutionBackend, SecretStore } from '../engine';
import { DockerExecutionBackend } from './docker-execution.backend';
import { EnvSecretStore } from './env-secret.store';

@Module({
  providers: [
    { provide: ExecutionBackend, useClass: DockerExecutionBackend },
    { provide: SecretStore, useClass: EnvSecretStore },
  ],
  exports: [ExecutionBackend, SecretStore],
})
export class ExecutionModule {}
