import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  OneToMany,
  Index,
} from 'typeorm';
import type { PipelineState } from '../../engine';
import { Build } from './build.entity';
import { BuildStep } from './build-step.entity';

@Entity('build_pipelines')
@Index(['build_id', 'name'], { unique: true })
export class BuildPipeline {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  build_id!: string;

  @ManyToOne(() => Build, (build) => build.pipelines, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'build_id' })
  build!: Build;

  @Column({ length: 255 })
  name!: string;

  /** Index in the compiled graph */
  @Column({ type: 'int' })
  position!: number;

  @Column({ type: 'int', default: 0 })
  layer!: number;

  @Column({ type: 'varchar', length: 50, default: 'pending' })
  state!: PipelineState;

  @Column({ type: 'varchar', length: 255, nullable: true })
  blocked_by!: string | null;

  @Column({ type: 'text', nullable: true })
  reason!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @OneToMany(() => BuildStep, (step) => step.build_pipeline)
  steps!: BuildStep[];
}
