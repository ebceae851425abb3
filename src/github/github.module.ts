import { Module } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../config/app-config.js';
import { GithubController } from './github.controller.js';
import { OctokitProvider } from './octokit-provider.js';
import { REPOSITORY_PROVIDER } from './repository-provider.interface.js';

@Module({
  controllers: [GithubController],
  providers: [
    {
      provide: REPOSITORY_PROVIDER,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) =>
        new OctokitProvider({
          token: config.githubToken,
          username: config.githubUsername,
          baseUrl: config.githubApiUrl,
        }),
    },
  ],
  exports: [REPOSITORY_PROVIDER],
})
export class GithubModule {}
