import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  PowerOceanSettings,
  readPowerOceanSettings,
} from '../config/powerocean.config';
import { EcoflowClient, EcoflowEnvelope } from './ecoflow.client';
import { EcoflowApiError } from './ecoflow.errors';
import { SensorMap } from './interfaces/endpoint.interface';
import { PowerOceanNormalizer } from './powerocean-normalizer.service';

const NOT_NORMALIZED = 'Response could not be normalized';

/**
 * Static device description exposed next to the sensors.
 */
export interface PowerOceanDevice {
  product: string;
  vendor: string;
  serial: string;
  version: string;
  build: string;
  name: string;
  features: string;
}

/**
 * Last known sensor table plus freshness information.
 */
export interface SensorSnapshot {
  sensors: SensorMap;
  /** Time of the last cycle that produced sensors. */
  updatedAt: Date | null;
  /** True when the latest cycle failed or could not be normalized. */
  stale: boolean;
  lastError: string | null;
}

/**
 * PowerOceanService - one fetch cycle at a time
 *
 * Owns the session token and the last good sensor table. A cycle that
 * cannot be normalized keeps the previous sensors and only flags them as
 * stale; it never clears them.
 */
@Injectable()
export class PowerOceanService {
  private readonly logger = new Logger(PowerOceanService.name);
  private readonly settings: PowerOceanSettings;

  private token: string | null = null;
  private inFlight: Promise<SensorSnapshot> | null = null;
  private snapshot: SensorSnapshot = {
    sensors: new Map(),
    updatedAt: null,
    stale: true,
    lastError: null,
  };

  constructor(
    configService: ConfigService,
    private readonly client: EcoflowClient,
    private readonly normalizer: PowerOceanNormalizer,
  ) {
    this.settings = readPowerOceanSettings(configService);
  }

  get serial(): string {
    return this.settings.serial;
  }

  getDevice(): PowerOceanDevice {
    return {
      product: 'PowerOcean',
      vendor: 'Ecoflow',
      serial: this.settings.serial,
      version: '5.1.15',
      build: '6',
      name: 'PowerOcean',
      features: 'Photovoltaik',
    };
  }

  getSnapshot(): SensorSnapshot {
    return this.snapshot;
  }

  /**
   * Run one fetch cycle. Concurrent callers share the cycle in flight.
   *
   * @throws the transport error after flagging the snapshot as stale
   */
  refresh(): Promise<SensorSnapshot> {
    if (!this.inFlight) {
      this.inFlight = this.runCycle().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async runCycle(): Promise<SensorSnapshot> {
    let response: EcoflowEnvelope;
    try {
      response = await this.fetchWithSession();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Fetch cycle failed: ${message}`);
      this.snapshot = { ...this.snapshot, stale: true, lastError: message };
      throw error;
    }

    const sensors = this.normalizer.normalize(response, this.settings.serial);
    if (sensors === null) {
      this.logger.warn(
        `No sensors produced this cycle, keeping ${this.snapshot.sensors.size} previous sensor(s)`,
      );
      this.snapshot = {
        ...this.snapshot,
        stale: true,
        lastError: NOT_NORMALIZED,
      };
      return this.snapshot;
    }

    this.snapshot = {
      sensors,
      updatedAt: new Date(),
      stale: false,
      lastError: null,
    };
    this.logger.log(`Fetched ${sensors.size} sensor(s)`);
    return this.snapshot;
  }

  /**
   * Fetch the device detail, logging in first if needed. An expired token
   * (HTTP 401) triggers exactly one re-login; any other API error drops
   * the token so the next cycle starts with a fresh login.
   */
  private async fetchWithSession(): Promise<EcoflowEnvelope> {
    const token = this.token ?? (await this.login());
    try {
      return await this.client.fetchDeviceDetail(this.settings.serial, token);
    } catch (error) {
      if (!(error instanceof EcoflowApiError)) {
        throw error;
      }
      if (error.status !== 401) {
        // Auth rejections may arrive as HTTP 200; log in again next cycle.
        this.token = null;
        throw error;
      }
      this.logger.warn('Session token rejected, logging in again');
      this.token = null;
      const renewed = await this.login();
      return this.client.fetchDeviceDetail(this.settings.serial, renewed);
    }
  }

  private async login(): Promise<string> {
    const session = await this.client.authorize();
    this.token = session.token;
    return session.token;
  }
}
