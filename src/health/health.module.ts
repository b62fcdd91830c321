import { Module } from '@nestjs/common';
import { PowerOceanModule } from '../powerocean';
import { HealthController } from './health.controller';

@Module({
  imports: [PowerOceanModule],
  controllers: [HealthController],
})
export class HealthModule {}
