import { Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthCheckDto,
  HealthStatus,
  LiveCheck,
  MemoryCheck,
} from './common/dto/health-check.dto';
import { LiveUpgradeService } from './live/gateway/live-upgrade.service';
import { LiveStatsService } from './live/stats/live-stats.service';

const MEMORY_WARNING_THRESHOLD = 0.8;
const MEMORY_CRITICAL_THRESHOLD = 0.95;
const DEFAULT_VERSION = '0.1.0';

@Injectable()
export class AppService {
  private readonly startTime = Date.now();

  constructor(
    private readonly liveStats: LiveStatsService,
    private readonly liveUpgrade: LiveUpgradeService,
    @Optional() private readonly configService?: ConfigService,
  ) {}

  getHealth(): { status: string; timestamp: string } {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }

  getDetailedHealth(): HealthCheckDto {
    const memoryCheck = this.checkMemory();
    const liveCheck = this.checkLive();

    return {
      status: this.determineOverallStatus(memoryCheck, liveCheck),
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || DEFAULT_VERSION,
      environment: this.configService?.get<string>('NODE_ENV') ?? 'development',
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      checks: {
        memory: memoryCheck,
        live: liveCheck,
      },
    };
  }

  private checkMemory(): MemoryCheck {
    const { heapUsed, heapTotal, rss } = process.memoryUsage();
    const percentage = heapTotal > 0 ? heapUsed / heapTotal : 0;

    let status: HealthStatus = 'healthy';
    if (percentage >= MEMORY_CRITICAL_THRESHOLD) {
      status = 'unhealthy';
    } else if (percentage >= MEMORY_WARNING_THRESHOLD) {
      status = 'degraded';
    }

    return {
      status,
      heapUsed,
      heapTotal,
      rss,
      percentage: Math.round(percentage * 100) / 100,
    };
  }

  private checkLive(): LiveCheck {
    const socketAttached = this.liveUpgrade.isAttached();
    return {
      status: socketAttached ? 'healthy' : 'degraded',
      socketAttached,
      ...this.liveStats.getStats(),
    };
  }

  private determineOverallStatus(memory: MemoryCheck, live: LiveCheck): HealthStatus {
    if (memory.status === 'unhealthy' || live.status === 'unhealthy') {
      return 'unhealthy';
    }
    if (memory.status === 'degraded' || live.status === 'degraded') {
      return 'degraded';
    }
    return 'healthy';
  }
}
