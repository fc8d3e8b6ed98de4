import type {
  BuildStatus,
  CompiledGraph,
  EventDescriptor,
  PipelineState,
  StepStatus,
} from '../engine';
import type { BuildRecordStatus } from './entities';

export interface BuildRecord {
  id: string;
  projectId: string;
  status: BuildRecordStatus;
  error?: string;
}

export interface PipelineUpdate {
  state: PipelineState;
  blockedBy?: string;
  reason?: string;
  at: Date;
}

export interface StepUpdate {
  status: StepStatus;
  exitCode?: number;
  error?: string;
  at: Date;
}

/**
 * Where builds and their pipeline and step results are recorded.
 * Used as the injection token; the database module binds the TypeORM store.
 */
export abstract class BuildHistoryStore {
  abstract createBuild(
    projectId: string,
    event: EventDescriptor,
    branch: string | null,
  ): Promise<BuildRecord>;

  /** Create a row per pipeline and step of the graph and mark the build running. */
  abstract recordGraph(buildId: string, graph: CompiledGraph): Promise<void>;

  abstract updatePipeline(buildId: string, pipeline: string, update: PipelineUpdate): Promise<void>;

  abstract updateStep(
    buildId: string,
    pipeline: string,
    step: string,
    update: StepUpdate,
  ): Promise<void>;

  abstract finishBuild(buildId: string, status: BuildRecordStatus, error?: string): Promise<void>;

  /** Status of the latest finished build of a project branch, if any. */
  abstract lastStatus(projectId: string, branch: string): Promise<BuildStatus | undefined>;
}
