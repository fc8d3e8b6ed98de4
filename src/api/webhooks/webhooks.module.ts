import { Module } from '@nestjs/common';
import { GitWebhookController } from './git-webhook.controller';
import { ProjectsModule } from '../projects/projects.module';
import { BuildsModule } from '../builds/builds.module';

@Module({
  imports: [ProjectsModule, BuildsModule],
  controllers: [GitWebhookController],
})
export class WebhooksModule {}
