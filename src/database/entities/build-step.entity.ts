import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Index } from 'typeorm';
import type { StepStatus } from '../../engine';
import { BuildPipeline } from './build-pipeline.entity';

@Entity('build_steps')
@Index(['build_id', 'pipeline_name', 'name'], { unique: true })
export class BuildStep {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  build_pipeline_id!: string;

  @ManyToOne(() => BuildPipeline, (pipeline) => pipeline.steps, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'build_pipeline_id' })
  build_pipeline!: BuildPipeline;

  // Denormalized so progress updates can address a step without a join.
  @Column({ type: 'uuid' })
  build_id!: string;

  @Column({ length: 255 })
  pipeline_name!: string;

  @Column({ length: 255 })
  name!: string;

  @Column({ type: 'int' })
  position!: number;

  @Column({ type: 'varchar', length: 50, default: 'pending' })
  status!: StepStatus;

  @Column({ type: 'int', nullable: true })
  exit_code!: number | null;

  @Column({ type: 'text', nullable: true })
  error!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;
}
