import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readPowerOceanSettings } from '../config/powerocean.config';
import { PowerOceanService } from './powerocean.service';

/**
 * Triggers a fetch cycle every POWEROCEAN_POLL_INTERVAL_SECONDS.
 * An interval of 0 leaves polling to explicit refresh requests.
 */
@Injectable()
export class PowerOceanPoller implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PowerOceanPoller.name);
  private readonly intervalMs: number;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    configService: ConfigService,
    private readonly powerOceanService: PowerOceanService,
  ) {
    this.intervalMs =
      readPowerOceanSettings(configService).pollIntervalSeconds * 1000;
  }

  onModuleInit(): void {
    if (this.intervalMs <= 0) {
      this.logger.log('Polling disabled');
      return;
    }
    this.logger.log(`Polling every ${this.intervalMs / 1000}s`);
    void this.poll();
    this.timer = setInterval(() => void this.poll(), this.intervalMs);
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * One scheduled cycle. Failures are logged and retried on the next tick.
   */
  async poll(): Promise<void> {
    try {
      await this.powerOceanService.refresh();
    } catch (error) {
      this.logger.error(
        `Scheduled refresh failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
