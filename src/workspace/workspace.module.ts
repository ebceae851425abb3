import { Module } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../config/app-config.js';
import { GitCliWorkspace } from './git-cli-workspace.js';
import { VERSION_CONTROL_WORKSPACE } from './version-control-workspace.interface.js';

@Module({
  providers: [
    {
      provide: VERSION_CONTROL_WORKSPACE,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => new GitCliWorkspace({ token: config.githubToken }),
    },
  ],
  exports: [VERSION_CONTROL_WORKSPACE],
})
export class WorkspaceModule {}
