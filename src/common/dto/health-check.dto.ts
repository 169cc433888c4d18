import { LiveCounters } from '../../live/stats/live-stats.service';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface MemoryCheck {
  status: HealthStatus;
  heapUsed: number;
  heapTotal: number;
  rss: number;
  percentage: number;
}

export interface LiveCheck {
  status: HealthStatus;
  /** false when no HTTP server took the upgrade listener; only polling works then */
  socketAttached: boolean;
  sessions: number;
  connections: number;
  pendingPatches: number;
  cleanups: number;
  counters: LiveCounters;
}

export interface HealthCheckDto {
  status: HealthStatus;
  timestamp: string;
  version: string;
  environment: string;
  uptime: number;
  checks: {
    memory: MemoryCheck;
    live: LiveCheck;
  };
}
