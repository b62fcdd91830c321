import {
  BadGatewayException,
  Controller,
  Get,
  HttpCode,
  Logger,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { PowerOceanEndpoint } from './interfaces/endpoint.interface';
import {
  PowerOceanDevice,
  PowerOceanService,
  SensorSnapshot,
} from './powerocean.service';

/**
 * Response body for the sensor table
 */
export interface SensorsResponse {
  serial: string;
  updatedAt: string | null;
  stale: boolean;
  lastError: string | null;
  count: number;
  sensors: Record<string, PowerOceanEndpoint>;
}

/**
 * PowerOceanController
 *
 * Endpoints:
 * - GET /powerocean/sensors - Current sensor table
 * - GET /powerocean/sensors/:id - One sensor by internalUniqueId
 * - POST /powerocean/refresh - Run a fetch cycle now
 * - GET /powerocean/device - Static device description
 */
@Controller('powerocean')
export class PowerOceanController {
  private readonly logger = new Logger(PowerOceanController.name);

  constructor(private readonly powerOceanService: PowerOceanService) {}

  @Get('sensors')
  getSensors(): SensorsResponse {
    return this.toResponse(this.powerOceanService.getSnapshot());
  }

  /**
   * @example
   * GET /powerocean/sensors/HJ31000000000001_sysLoadPwr
   */
  @Get('sensors/:id')
  getSensor(@Param('id') id: string): PowerOceanEndpoint {
    const sensor = this.powerOceanService.getSnapshot().sensors.get(id);
    if (!sensor) {
      throw new NotFoundException(`Unknown sensor: ${id}`);
    }
    return sensor;
  }

  @Post('refresh')
  @HttpCode(200)
  async refresh(): Promise<SensorsResponse> {
    this.logger.log('POST /powerocean/refresh');
    try {
      return this.toResponse(await this.powerOceanService.refresh());
    } catch (error) {
      throw new BadGatewayException(
        `EcoFlow API request failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  @Get('device')
  getDevice(): PowerOceanDevice {
    return this.powerOceanService.getDevice();
  }

  private toResponse(snapshot: SensorSnapshot): SensorsResponse {
    return {
      serial: this.powerOceanService.serial,
      updatedAt: snapshot.updatedAt ? snapshot.updatedAt.toISOString() : null,
      stale: snapshot.stale,
      lastError: snapshot.lastError,
      count: snapshot.sensors.size,
      sensors: Object.fromEntries(snapshot.sensors),
    };
  }
}
