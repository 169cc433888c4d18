import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AutoReloadService } from './autoreload/auto-reload.service';
import { PatchDispatcherService } from './dispatcher/patch-dispatcher.service';
import { LiveUpgradeService } from './gateway/live-upgrade.service';
import { LiveController } from './live.controller';
import { PatchQueueService } from './queue/patch-queue.service';
import { SessionRegistryService } from './registry/session-registry.service';
import { LiveStatsService } from './stats/live-stats.service';
import { LiveTimerService } from './timers/live-timer.service';

@Module({
  imports: [ConfigModule],
  controllers: [LiveController],
  providers: [
    SessionRegistryService,
    PatchQueueService,
    PatchDispatcherService,
    LiveUpgradeService,
    LiveTimerService,
    LiveStatsService,
    AutoReloadService,
  ],
  exports: [PatchDispatcherService, LiveTimerService, LiveStatsService, LiveUpgradeService],
})
export class LiveModule {}
