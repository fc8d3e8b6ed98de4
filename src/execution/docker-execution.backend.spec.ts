import { dockerRunArgs, stepScript } from './docker-execution.backend';

describe('stepScript', () => {
  it('stops at the first failing command', () => {
    expect(stepScript(['pip install tox', 'tox -e py312'])).toBe('set -e\npip install tox\ntox -e py312');
  });
});

describe('dockerRunArgs', () => {
  it('passes environment names but never their values', () => {
    const args = dockerRunArgs({
      pipeline: 'build-container-arm64',
      name: 'publish',
      image: 'docker:24',
      platform: 'linux/arm64',
      commands: ['docker push example/widgets'],
      environment: { DOCKER_PASSWORD: 'test-password', CI: 'true' },
    });

    expect(args).toEqual([
      'run',
      '--rm',
      '--platform',
      'linux/arm64',
      '-e',
      'CI',
      '-e',
      'DOCKER_PASSWORD',
      '--entrypoint',
      '/bin/sh',
      'docker:24',
      '-c',
      'set -e\ndocker push example/widgets',
    ]);
    expect(args).not.toContain('test-password');
  });
});
