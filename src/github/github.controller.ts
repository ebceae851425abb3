import { Controller, Get, Inject } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import {
  REPOSITORY_PROVIDER,
  type RateLimitStatus,
  type RepositoryProvider,
} from './repository-provider.interface.js';

@ApiTags('GitHub')
@Controller('github')
export class GithubController {
  constructor(
    @Inject(REPOSITORY_PROVIDER) private readonly provider: RepositoryProvider,
  ) {}

  // GET /github/rate-limit
  @Get('rate-limit')
  @ApiOperation({ summary: 'Core REST rate limit of the configured token' })
  async rateLimit(): Promise<RateLimitStatus> {
    return this.provider.getRateLimit();
  }
}
