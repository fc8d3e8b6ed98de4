import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  OneToMany,
  Index,
} from 'typeorm';
import type { EventDescriptor } from '../../engine';
import { Project } from './project.entity';
import { BuildPipeline } from './build-pipeline.entity';

export const BUILD_RECORD_STATUSES = [
  'pending',
  'running',
  'success',
  'failure',
  'skipped',
  'cancelled',
  'error',
] as const;
export type BuildRecordStatus = (typeof BUILD_RECORD_STATUSES)[number];

/**
 * One scheduler run of a project's compiled graph for one event.
 * status is 'error' when the templates did not compile or the run itself broke.
 */
@Entity('builds')
@Index(['project_id', 'branch', 'created_at'])
export class Build {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  project_id!: string;

  @ManyToOne(() => Project, (p) => p.builds, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'project_id' })
  project!: Project;

  @Column('jsonb')
  event!: EventDescriptor;

  /** Branch the event belongs to; null for tags */
  @Column({ type: 'varchar', length: 255, nullable: true })
  branch!: string | null;

  @Column({ type: 'varchar', length: 50, default: 'pending' })
  status!: BuildRecordStatus;

  @Column({ type: 'text', nullable: true })
  error!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @OneToMany(() => BuildPipeline, (pipeline) => pipeline.build)
  pipelines!: BuildPipeline[];
}
