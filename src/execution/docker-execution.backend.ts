import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { spawn } from 'node:child_process';
import { ExecutionBackend, type ResolvedStep, type StepRunContext } from '../engine';
import { createLineBuffer } from './line-buffer';

/**
 * Shell script a step's container runs: stop at the first failing command.
 */
export function stepScript(commands: string[]): string {
  return ['set -e', ...commands].join('\n');
}

/**
 * Arguments for `docker run`. Environment values are not put on the
 * command line; `-e NAME` makes docker copy them from its own environment.
 */
export function dockerRunArgs(step: ResolvedStep): string[] {
  const args = ['run', '--rm', '--platform', step.platform];
  for (const name of Object.keys(step.environment).sort()) {
    args.push('-e', name);
  }
  args.push('--entrypoint', '/bin/sh', step.image, '-c', stepScript(step.commands));
  return args;
}

/**
 * Runs each step in a throwaway container. Output is split into lines,
 * logged and handed to the scheduler; aborting the step stops the container.
 */
@Injectable()
export class DockerExecutionBackend extends ExecutionBackend {
  private readonly logger = new Logger(DockerExecutionBackend.name);

  constructor(private readonly config: ConfigService) {
    super();
  }

  runStep(step: ResolvedStep, context: StepRunContext): Promise<number> {
    const docker = this.config.get<string>('DOCKER_BIN') ?? 'docker';
    const label = `${step.pipeline}/${step.name}`;

    return new Promise<number>((resolve, reject) => {
      const child = spawn(docker, dockerRunArgs(step), {
        env: { ...process.env, ...step.environment },
      });

      const stdoutBuffer = createLineBuffer((line) => {
        this.logger.verbose(`[${label}] ${line}`);
        context.onOutput(line, 'stdout');
      });
      const stderrBuffer = createLineBuffer((line) => {
        this.logger.verbose(`[${label}] ${line}`);
        context.onOutput(line, 'stderr');
      });

      const onAbort = () => {
        this.logger.warn(`Stopping ${label}`);
        child.kill('SIGTERM');
      };
      context.signal.addEventListener('abort', onAbort, { once: true });
      if (context.signal.aborted) onAbort();

      child.stdout.on('data', (buf: Buffer) => stdoutBuffer.write(buf));
      child.stderr.on('data', (buf: Buffer) => stderrBuffer.write(buf));

      child.on('close', (code) => {
        context.signal.removeEventListener('abort', onAbort);
        // Flush any partial line that didn't end in \n
        stdoutBuffer.flush();
        stderrBuffer.flush();
        resolve(code ?? 1);
      });
      child.on('error', (err) => {
        context.signal.removeEventListener('abort', onAbort);
        stdoutBuffer.flush();
        stderrBuffer.flush();
        this.logger.error(`Could not start ${label}: ${err.message}`);
        reject(err);
      });
    });
  }
}
