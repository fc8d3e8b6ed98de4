/**
 * Dependency Graph
 *
 * Resolves dependsOn names to pipeline indices once, rejects unknown
 * names and cycles, and assigns every pipeline a topological layer.
 */
import { ConfigError } from './errors';
import type { CompiledGraph, CompiledPipeline, Pipeline } from './types';

/**
 * Build the graph for a set of concrete pipelines.
 *
 * A dependsOn entry naming a concrete pipeline points at that pipeline;
 * otherwise it points at every pipeline expanded from the template of that
 * name (all matrix instances).
 */
export function buildDependencyGraph(pipelines: Pipeline[]): CompiledGraph {
  const byName = new Map<string, number>();
  const byTemplate = new Map<string, number[]>();

  pipelines.forEach((pipeline, index) => {
    if (byName.has(pipeline.name)) {
      throw new ConfigError(`Duplicate pipeline name '${pipeline.name}'`);
    }
    byName.set(pipeline.name, index);

    const instances = byTemplate.get(pipeline.templateName) ?? [];
    instances.push(index);
    byTemplate.set(pipeline.templateName, instances);
  });

  const dependencies = pipelines.map((pipeline) => {
    const resolved = new Set<number>();
    for (const dep of pipeline.dependsOn) {
      const exact = byName.get(dep);
      const targets = exact !== undefined ? [exact] : byTemplate.get(dep);
      if (!targets) {
        throw new ConfigError(`Pipeline '${pipeline.name}' depends on unknown pipeline '${dep}'`);
      }
      for (const target of targets) resolved.add(target);
    }
    return [...resolved].sort((a, b) => a - b);
  });

  const cycle = findCycle(dependencies);
  if (cycle) {
    const path = cycle.map((i) => pipelines[i].name).join(' -> ');
    throw new ConfigError(`Dependency cycle detected: ${path}`);
  }

  const layerOf = assignLayers(dependencies);
  const layers: number[][] = [];
  layerOf.forEach((layer, index) => {
    (layers[layer] ??= []).push(index);
  });

  const compiled: CompiledPipeline[] = pipelines.map((pipeline, index) => ({
    ...pipeline,
    index,
    dependencies: dependencies[index],
    layer: layerOf[index],
  }));

  return { pipelines: compiled, layers, byName };
}

/**
 * Depth-first search for a back edge. Returns the cycle as a closed path
 * (first element repeated at the end), or null.
 */
export function findCycle(dependencies: number[][]): number[] | null {
  const visited = new Set<number>();
  const stack: number[] = [];
  const onStack = new Set<number>();

  function visit(node: number): number[] | null {
    if (onStack.has(node)) {
      return [...stack.slice(stack.indexOf(node)), node];
    }
    if (visited.has(node)) return null;

    visited.add(node);
    stack.push(node);
    onStack.add(node);

    for (const dep of dependencies[node]) {
      const cycle = visit(dep);
      if (cycle) return cycle;
    }

    stack.pop();
    onStack.delete(node);
    return null;
  }

  for (let node = 0; node < dependencies.length; node++) {
    const cycle = visit(node);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Layer of a node = 1 + the highest layer among its dependencies.
 * Expects an acyclic input.
 */
function assignLayers(dependencies: number[][]): number[] {
  const layers = new Array<number>(dependencies.length).fill(-1);

  function layerOf(node: number): number {
    if (layers[node] >= 0) return layers[node];
    let layer = 0;
    for (const dep of dependencies[node]) {
      layer = Math.max(layer, layerOf(dep) + 1);
    }
    layers[node] = layer;
    return layer;
  }

  for (let node = 0; node < dependencies.length; node++) layerOf(node);
  return layers;
}
