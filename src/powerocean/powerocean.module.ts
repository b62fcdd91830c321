import { Module } from '@nestjs/common';
import { EcoflowClient } from './ecoflow.client';
import { BatteryPackExtractor } from './extractors/battery-pack.extractor';
import { ChangeReportExtractor } from './extractors/change-report.extractor';
import { HeartbeatExtractor } from './extractors/heartbeat.extractor';
import { RootExtractor } from './extractors/root.extractor';
import { PowerOceanNormalizer } from './powerocean-normalizer.service';
import { PowerOceanController } from './powerocean.controller';
import { PowerOceanPoller } from './powerocean.poller';
import { PowerOceanService } from './powerocean.service';

/**
 * PowerOceanModule
 *
 * Components:
 * - EcoflowClient: login and device detail requests
 * - PowerOceanNormalizer: flattens a device detail response into sensors,
 *   using one extractor per report section
 * - PowerOceanService: fetch cycle and last known sensor table
 * - PowerOceanPoller: periodic refresh
 * - PowerOceanController: read and refresh endpoints
 *
 * Relies on a global ConfigModule.
 */
@Module({
  controllers: [PowerOceanController],
  providers: [
    EcoflowClient,
    RootExtractor,
    ChangeReportExtractor,
    BatteryPackExtractor,
    HeartbeatExtractor,
    PowerOceanNormalizer,
    PowerOceanService,
    PowerOceanPoller,
  ],
  exports: [PowerOceanService, PowerOceanNormalizer],
})
export class PowerOceanModule {}
