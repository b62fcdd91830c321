import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import request from 'supertest';
import { App } from 'supertest/types';
import { PowerOceanModule } from '../src/powerocean';
import { HealthModule } from '../src/health/health.module';
import { EcoflowClient } from '../src/powerocean/ecoflow.client';
import { EcoflowConnectionError } from '../src/powerocean/ecoflow.errors';
import { OWN_SERIAL, TEST_ENV, loadFixture } from './utils/mock-data';

/**
 * E2E Tests for the PowerOcean HTTP surface
 *
 * Uses the real PowerOceanModule (controller, service, normalizer and
 * extractors) but overrides the EcoflowClient so no request leaves the
 * process.
 */
describe('PowerOceanController (e2e)', () => {
  let app: INestApplication<App>;
  let fakeClient: {
    authorize: jest.Mock;
    fetchDeviceDetail: jest.Mock;
  };

  beforeEach(async () => {
    fakeClient = {
      authorize: jest.fn().mockResolvedValue({
        token: 'test-token',
        userId: '4711',
        userName: 'Owner',
      }),
      fetchDeviceDetail: jest
        .fn()
        .mockResolvedValue(loadFixture('dual-inverter-response')),
    };

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => TEST_ENV],
        }),
        PowerOceanModule,
        HealthModule,
      ],
    })
      .overrideProvider(EcoflowClient)
      .useValue(fakeClient)
      .compile();

    app = moduleFixture.createNestApplication();
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /powerocean/sensors', () => {
    it('should return an empty, stale table before the first cycle', async () => {
      const response = await request(app.getHttpServer())
        .get('/powerocean/sensors')
        .expect(200);

      expect(response.body).toEqual({
        serial: OWN_SERIAL,
        updatedAt: null,
        stale: true,
        lastError: null,
        count: 0,
        sensors: {},
      });
    });
  });

  describe('POST /powerocean/refresh', () => {
    it('should run a cycle and return the normalized table', async () => {
      const response = await request(app.getHttpServer())
        .post('/powerocean/refresh')
        .expect(200);

      expect(response.body).toMatchObject({
        serial: OWN_SERIAL,
        stale: false,
        lastError: null,
        count: 41,
      });
      expect(fakeClient.fetchDeviceDetail).toHaveBeenCalledWith(
        OWN_SERIAL,
        'test-token',
      );
    });

    it('should return 502 when the EcoFlow API is unreachable', async () => {
      fakeClient.fetchDeviceDetail.mockRejectedValueOnce(
        new EcoflowConnectionError('https://api.example.test'),
      );

      const response = await request(app.getHttpServer())
        .post('/powerocean/refresh')
        .expect(502);

      expect(response.body.message).toBe(
        'EcoFlow API request failed: Unable to connect to https://api.example.test. Device might be offline.',
      );
    });
  });

  describe('GET /powerocean/sensors/:id', () => {
    it('should return one sensor after a refresh', async () => {
      await request(app.getHttpServer()).post('/powerocean/refresh').expect(200);

      const response = await request(app.getHttpServer())
        .get(`/powerocean/sensors/${OWN_SERIAL}_JTS1_EMS_CHANGE_REPORT_bpSoc`)
        .expect(200);

      expect(response.body).toEqual({
        internalUniqueId: `${OWN_SERIAL}_JTS1_EMS_CHANGE_REPORT_bpSoc`,
        serial: OWN_SERIAL,
        name: `${OWN_SERIAL}_bpSoc`,
        friendlyName: 'bpSoc_master',
        value: 61,
        unit: '%',
        description: 'Ladezustand der Batterie',
        icon: null,
      });
    });

    it('should return 404 for an unknown sensor', async () => {
      const response = await request(app.getHttpServer())
        .get('/powerocean/sensors/unknown')
        .expect(404);

      expect(response.body.message).toBe('Unknown sensor: unknown');
    });
  });

  describe('GET /powerocean/device', () => {
    it('should describe the configured device', async () => {
      const response = await request(app.getHttpServer())
        .get('/powerocean/device')
        .expect(200);

      expect(response.body).toEqual({
        product: 'PowerOcean',
        vendor: 'Ecoflow',
        serial: OWN_SERIAL,
        version: '5.1.15',
        build: '6',
        name: 'PowerOcean',
        features: 'Photovoltaik',
      });
    });
  });

  describe('GET /health', () => {
    it('should summarize the sensor table', async () => {
      await request(app.getHttpServer()).post('/powerocean/refresh').expect(200);

      const response = await request(app.getHttpServer())
        .get('/health')
        .expect(200);

      expect(response.body).toMatchObject({
        status: 'ok',
        sensors: { count: 41, stale: false },
      });
    });
  });
});
