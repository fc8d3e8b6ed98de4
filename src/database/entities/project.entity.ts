import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
} from 'typeorm';
import { Build } from './build.entity';

/**
 * Pipeline templates as stored: validated when the project is saved and
 * compiled again for every build.
 */
export interface ProjectConfig {
  pipelines: unknown[];
}

/**
 * One repository with its pipeline templates.
 * repository is matched against incoming git webhooks (URL or owner/name).
 */
@Entity('projects')
export class Project {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  name!: string;

  @Column({ length: 500 })
  repository!: string;

  @Column({ length: 255, default: 'main' })
  default_branch!: string;

  @Column('jsonb')
  config!: ProjectConfig;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;

  @OneToMany(() => Build, (build) => build.project)
  builds!: Build[];
}
