import { Controller, Get, Header, Logger } from '@nestjs/common';
import { ExamplesService } from './examples.service';
import { EXAMPLES_DEFAULTS } from './examples.constants';
import { PatchDispatcherService } from '../live/dispatcher/patch-dispatcher.service';
import { Target } from '../live/target';
import { LiveTimerService } from '../live/timers/live-timer.service';
import { SessionId } from '../session/decorators/session-id.decorator';

/**
 * Demo pages that keep patching themselves after the response went out
 */
@Controller()
export class ExamplesController {
  private readonly logger = new Logger(ExamplesController.name);

  constructor(
    private readonly examplesService: ExamplesService,
    private readonly dispatcher: PatchDispatcherService,
    private readonly timers: LiveTimerService,
  ) {}

  @Get()
  @Header('Content-Type', 'text/html; charset=utf-8')
  index(): string {
    return this.examplesService.index();
  }

  @Get('clock')
  @Header('Content-Type', 'text/html; charset=utf-8')
  clock(@SessionId() sessionId: string): string {
    const target = new Target();

    // stops on its own once the browser reports the clock gone
    const ticker = this.timers.every(EXAMPLES_DEFAULTS.CLOCK_INTERVAL_MS, () =>
      this.dispatcher.patch(
        sessionId,
        target.replace,
        () => this.examplesService.clock(target, new Date()),
        () => this.stopTicker(ticker.stop(), target),
      ),
    );

    return this.examplesService.clockPage(target, new Date());
  }

  @Get('deferred')
  @Header('Content-Type', 'text/html; charset=utf-8')
  deferred(@SessionId() sessionId: string): string {
    const target = new Target();

    this.timers.after(EXAMPLES_DEFAULTS.DEFERRED_DELAY_MS, () =>
      this.dispatcher.patch(sessionId, target.replace, () =>
        this.examplesService.deferredContent(target),
      ),
    );

    return this.examplesService.deferredPage(target);
  }

  @Get('append')
  @Header('Content-Type', 'text/html; charset=utf-8')
  append(@SessionId() sessionId: string): string {
    const target = new Target();
    let appended = 0;

    const feeder = this.timers.every(EXAMPLES_DEFAULTS.APPEND_INTERVAL_MS, () => {
      appended++;
      if (appended >= EXAMPLES_DEFAULTS.APPEND_MAX_ENTRIES) {
        feeder.stop();
      }
      return this.dispatcher.patch(
        sessionId,
        target.append,
        () => this.examplesService.appendEntry(new Date()),
        () => this.stopTicker(feeder.stop(), target),
      );
    });

    return this.examplesService.appendPage(target);
  }

  private stopTicker(stopped: boolean, target: Target): void {
    if (stopped) {
      this.logger.debug(`Stopped updates for ${target.id}`);
    }
  }
}
