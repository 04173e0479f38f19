import { Controller, Get } from '@nestjs/common';

export interface HealthResponse {
  status: string;
  timestamp: string;
  uptime: string;
}

@Controller()
export class AppController {
  @Get('health')
  health(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: `${process.uptime().toFixed(2)}s`,
    };
  }
}
