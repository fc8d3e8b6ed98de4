import { ConfigError } from './errors';
import { DEFAULT_PLATFORM, expandMatrix, getCombinations, matrixPipelineName } from './matrix-expander';
import type { PipelineTemplate } from './types';

describe('expandMatrix', () => {
  const testTemplate: PipelineTemplate = {
    name: 'test',
    steps: [
      {
        name: 'pytest',
        image: 'docker.io/library/python:${PYTHON_VERSION}',
        commands: ['pip install tox', 'tox -e py${PYTHON_VERSION//./}'],
        environment: { PY_COLORS: '1', TOKEN: { fromSecret: 'codecov_token' } },
      },
    ],
    dependsOn: ['lint'],
    matrix: [{ name: 'PYTHON_VERSION', values: ['3.9', '3.10', '3.11', '3.12'] }],
  };

  it('creates one pipeline per axis value', () => {
    const pipelines = expandMatrix(testTemplate);

    expect(pipelines.map((p) => p.name)).toEqual([
      'test (PYTHON_VERSION=3.9)',
      'test (PYTHON_VERSION=3.10)',
      'test (PYTHON_VERSION=3.11)',
      'test (PYTHON_VERSION=3.12)',
    ]);
    expect(pipelines.map((p) => p.steps[0].image)).toEqual([
      'docker.io/library/python:3.9',
      'docker.io/library/python:3.10',
      'docker.io/library/python:3.11',
      'docker.io/library/python:3.12',
    ]);
    expect(pipelines[1].steps[0].commands).toEqual(['pip install tox', 'tox -e py310']);
  });

  it('keeps the template name and dependencies on every instance', () => {
    const pipelines = expandMatrix(testTemplate);

    for (const pipeline of pipelines) {
      expect(pipeline.templateName).toBe('test');
      expect(pipeline.dependsOn).toEqual(['lint']);
      expect(pipeline.platform).toBe(DEFAULT_PLATFORM);
    }
    expect(pipelines[0].matrix).toEqual({ PYTHON_VERSION: '3.9' });
  });

  it('exposes axis values in the step environment and keeps secret references', () => {
    const [first] = expandMatrix(testTemplate);

    expect(first.steps[0].environment).toEqual({
      PY_COLORS: '1',
      TOKEN: { fromSecret: 'codecov_token' },
      PYTHON_VERSION: '3.9',
    });
  });

  it('produces a single pipeline without axes', () => {
    const template: PipelineTemplate = {
      name: 'lint',
      steps: [{ name: 'flake8', image: 'python:3.12', commands: ['flake8'] }],
    };

    const pipelines = expandMatrix(template);

    expect(pipelines).toHaveLength(1);
    expect(pipelines[0]).toMatchObject({ name: 'lint', templateName: 'lint', matrix: {} });
  });

  it('multiplies axes into distinct pipelines', () => {
    const template: PipelineTemplate = {
      name: 'build',
      platform: 'linux/${ARCH}',
      steps: [{ name: 'compile', image: 'golang:${GO}', commands: ['go build'] }],
      matrix: [
        { name: 'GO', values: ['1.21', '1.22'] },
        { name: 'ARCH', values: ['amd64', 'arm64', 'arm'] },
      ],
    };

    const pipelines = expandMatrix(template);
    const names = pipelines.map((p) => p.name);

    expect(pipelines).toHaveLength(6);
    expect(new Set(names).size).toBe(6);
    expect(names[0]).toBe('build (GO=1.21, ARCH=amd64)');
    expect(names[1]).toBe('build (GO=1.21, ARCH=arm64)');
    expect(pipelines.map((p) => p.platform).slice(0, 3)).toEqual([
      'linux/amd64',
      'linux/arm64',
      'linux/arm',
    ]);
    expect(pipelines[5].steps[0].image).toBe('golang:1.22');
  });

  it('substitutes build variables into trigger patterns', () => {
    const template: PipelineTemplate = {
      name: 'docs',
      steps: [{ name: 'mkdocs', image: 'python:3.12', commands: ['mkdocs build'] }],
      when: [{ event: 'push', branch: '${CI_REPO_DEFAULT_BRANCH}' }],
    };

    const [pipeline] = expandMatrix(template, [], { CI_REPO_DEFAULT_BRANCH: 'main' });

    expect(pipeline.when).toEqual([{ event: 'push', branch: 'main' }]);
  });

  it('rejects placeholders that are not declared', () => {
    const template: PipelineTemplate = {
      name: 'test',
      steps: [{ name: 'unit', image: 'node:${NODE_VERSION}', commands: ['npm test'] }],
      matrix: [{ name: 'PYTHON_VERSION', values: ['3.12'] }],
    };

    expect(() => expandMatrix(template)).toThrow(
      new ConfigError(
        "Unknown placeholder '${NODE_VERSION}'",
        'test (PYTHON_VERSION=3.12).steps[0].image',
      ),
    );
  });

  it('rejects an axis without values', () => {
    const template: PipelineTemplate = {
      ...testTemplate,
      matrix: [{ name: 'PYTHON_VERSION', values: [] }],
    };

    expect(() => expandMatrix(template)).toThrow(
      new ConfigError("Matrix axis 'PYTHON_VERSION' has no values", 'test.matrix[0]'),
    );
  });

  it('rejects duplicate axes and repeated values', () => {
    expect(() =>
      expandMatrix(testTemplate, [
        { name: 'PYTHON_VERSION', values: ['3.11'] },
        { name: 'PYTHON_VERSION', values: ['3.12'] },
      ]),
    ).toThrow(ConfigError);
    expect(() =>
      expandMatrix(testTemplate, [{ name: 'PYTHON_VERSION', values: ['3.12', '3.12'] }]),
    ).toThrow("test.matrix[0]: Matrix axis 'PYTHON_VERSION' lists a value more than once");
  });

  it('rejects a platform that is not os/arch after substitution', () => {
    const template: PipelineTemplate = {
      name: 'build',
      platform: '${ARCH}',
      steps: [{ name: 'compile', image: 'golang', commands: [] }],
      matrix: [{ name: 'ARCH', values: ['arm64'] }],
    };

    expect(() => expandMatrix(template)).toThrow(
      "build (ARCH=arm64).platform: Platform 'arm64' must look like os/arch",
    );
  });
});

describe('getCombinations', () => {
  it('varies the last axis fastest', () => {
    expect(
      getCombinations([
        { name: 'A', values: ['1', '2'] },
        { name: 'B', values: ['x', 'y'] },
      ]),
    ).toEqual([
      { A: '1', B: 'x' },
      { A: '1', B: 'y' },
      { A: '2', B: 'x' },
      { A: '2', B: 'y' },
    ]);
  });

  it('returns one empty combination without axes', () => {
    expect(getCombinations([])).toEqual([{}]);
  });
});

describe('matrixPipelineName', () => {
  it('keeps the template name for an empty combination', () => {
    expect(matrixPipelineName('lint', {})).toBe('lint');
  });
});
