import { Controller, Get, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { APP_CONFIG, type AppConfig, describeConfig } from './config/app-config.js';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  @Get('health')
  getHealth(): object {
    return { status: 'ok', timestamp: new Date().toISOString() };
  }

  // token and API key are reported as configured/not configured only
  @Get('config')
  getConfig(): ReturnType<typeof describeConfig> {
    return describeConfig(this.config);
  }
}
