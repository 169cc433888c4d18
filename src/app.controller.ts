import { Controller, Get, UseInterceptors } from '@nestjs/common';
import { AppService } from './app.service';
import { HealthCheckDto } from './common/dto/health-check.dto';
import { ResponseInterceptor } from './common/interceptors/response.interceptor';

@Controller('health')
@UseInterceptors(ResponseInterceptor)
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  getHealth(): { status: string; timestamp: string } {
    return this.appService.getHealth();
  }

  @Get('detailed')
  getDetailedHealth(): HealthCheckDto {
    return this.appService.getDetailedHealth();
  }
}
