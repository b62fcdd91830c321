import { Controller, Get } from '@nestjs/common';
import { PowerOceanService } from '../powerocean';

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  sensors: {
    count: number;
    stale: boolean;
    updatedAt: string | null;
  };
}

/**
 * Liveness probe with a short summary of the sensor table.
 */
@Controller('health')
export class HealthController {
  constructor(private readonly powerOceanService: PowerOceanService) {}

  @Get()
  check(): HealthResponse {
    const snapshot = this.powerOceanService.getSnapshot();
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      sensors: {
        count: snapshot.sensors.size,
        stale: snapshot.stale,
        updatedAt: snapshot.updatedAt ? snapshot.updatedAt.toISOString() : null,
      },
    };
  }
}
