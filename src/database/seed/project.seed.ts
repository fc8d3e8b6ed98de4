import type { PipelineTemplate } from '../../engine';
import type { Project } from '../entities/project.entity';

const releaseWhen: PipelineTemplate['when'] = [
  { event: ['pull_request', 'tag'] },
  { event: ['push', 'manual'], branch: '${CI_REPO_DEFAULT_BRANCH}' },
];

function container(arch: string): PipelineTemplate {
  return {
    name: `build-container-${arch}`,
    platform: `linux/${arch}`,
    dependsOn: ['security'],
    when: releaseWhen,
    steps: [
      {
        name: 'dryrun',
        image: 'quay.io/thegeeklab/wp-docker-buildx:1',
        commands: ['docker buildx build --platform $CI_SYSTEM_PLATFORM -t ${CI_REPO_NAME//-/} .'],
      },
    ],
  };
}

const poetrySetup = ['pip install poetry -qq', 'poetry install -E ansible-core'];

const pythonProject: PipelineTemplate[] = [
  {
    name: 'lint',
    when: releaseWhen,
    steps: [
      {
        name: 'check-format',
        image: 'docker.io/library/python:3.12',
        commands: [...poetrySetup, 'poetry run ruff format --check --diff ./${CI_REPO_NAME//-/}'],
      },
      {
        name: 'check-coding',
        image: 'docker.io/library/python:3.12',
        commands: [...poetrySetup, 'poetry run ruff ./${CI_REPO_NAME//-/}'],
      },
    ],
  },
  {
    name: 'test',
    dependsOn: ['lint'],
    when: releaseWhen,
    matrix: [{ name: 'PYTHON_VERSION', values: ['3.9', '3.10', '3.11', '3.12'] }],
    steps: [
      {
        name: 'pytest',
        image: 'docker.io/library/python:${PYTHON_VERSION}',
        commands: [...poetrySetup, 'poetry run pytest'],
        environment: { PY_COLORS: '1' },
        group: 'test',
      },
      {
        name: 'coverage',
        image: 'docker.io/library/python:${PYTHON_VERSION}',
        commands: ['poetry run coverage xml'],
        group: 'test',
      },
    ],
  },
  {
    name: 'security',
    dependsOn: ['test'],
    when: releaseWhen,
    steps: [
      {
        name: 'bandit',
        image: 'docker.io/library/python:3.12',
        commands: [
          ...poetrySetup,
          'poetry run bandit -r ./${CI_REPO_NAME//-/} -x ./${CI_REPO_NAME//-/}/test',
        ],
      },
    ],
  },
  {
    name: 'build-package',
    dependsOn: ['security'],
    when: releaseWhen,
    steps: [
      {
        name: 'build',
        image: 'docker.io/library/python:3.12',
        commands: ['pip install poetry -qq', 'poetry build'],
      },
      {
        name: 'publish-pypi',
        image: 'docker.io/library/python:3.12',
        commands: ['poetry publish -n'],
        secrets: [{ source: 'pypi_password', target: 'POETRY_HTTP_BASIC_PYPI_PASSWORD' }],
        when: [{ event: 'tag' }],
      },
    ],
  },
  container('amd64'),
  container('arm64'),
  container('arm'),
  {
    name: 'docs',
    dependsOn: [
      'build-package',
      'build-container-amd64',
      'build-container-arm64',
      'build-container-arm',
    ],
    when: releaseWhen,
    concurrency: { group: 'docs-publish', limit: 1 },
    steps: [
      {
        name: 'markdownlint',
        image: 'quay.io/thegeeklab/markdownlint-cli',
        commands: ["markdownlint 'README.md' 'CONTRIBUTING.md'"],
      },
      {
        name: 'publish',
        image: 'quay.io/thegeeklab/wp-git-action:1',
        commands: ['git-action pages'],
        environment: { NETLIFY_TOKEN: { fromSecret: 'netlify_token' } },
        when: [{ event: 'push', branch: '${CI_REPO_DEFAULT_BRANCH}' }],
      },
    ],
  },
  {
    name: 'notifications',
    dependsOn: ['docs'],
    when: [{ event: ['tag', 'push'] }],
    steps: [
      {
        name: 'matrix',
        image: 'quay.io/thegeeklab/wp-matrix',
        commands: ['wp-matrix'],
        environment: {
          MATRIX_ROOMID: { fromSecret: 'matrix_roomid' },
          MATRIX_PASSWORD: { fromSecret: 'matrix_password' },
        },
      },
    ],
  },
];

/**
 * Example projects inserted on first app start when no projects exist.
 */
export const PROJECT_SEED: Partial<Project>[] = [
  {
    name: 'ansible-later',
    repository: 'https://github.com/example/ansible-later',
    default_branch: 'main',
    config: { pipelines: pythonProject },
  },
  {
    name: 'frontend-app',
    repository: 'https://github.com/example/frontend-app',
    default_branch: 'main',
    config: {
      pipelines: [
        {
          name: 'build',
          steps: [
            { name: 'install', image: 'node:20', commands: ['npm ci'] },
            { name: 'build', image: 'node:20', commands: ['npm run build'] },
          ],
        },
        {
          name: 'test',
          dependsOn: ['build'],
          steps: [{ name: 'test', image: 'node:20', commands: ['npm test'] }],
        },
        {
          name: 'deploy-production',
          dependsOn: ['test'],
          when: [{ event: 'push', branch: 'main' }],
          concurrency: { group: 'production', limit: 1 },
          steps: [
            {
              name: 'deploy',
              image: 'alpine:3.19',
              commands: ['./deploy.sh production'],
              secrets: [{ source: 'deploy_token', target: 'DEPLOY_TOKEN' }],
            },
          ],
        },
      ],
    },
  },
];
