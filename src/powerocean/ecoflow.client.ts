import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import {
  PowerOceanSettings,
  readPowerOceanSettings,
} from '../config/powerocean.config';
import {
  AuthenticationFailedError,
  EcoflowApiError,
  EcoflowConnectionError,
} from './ecoflow.errors';

/**
 * Every EcoFlow endpoint wraps its payload in this envelope.
 */
const envelopeSchema = z
  .object({
    code: z.union([z.string(), z.number()]).optional(),
    message: z.string(),
    data: z.unknown(),
  })
  .passthrough();

export type EcoflowEnvelope = z.infer<typeof envelopeSchema>;

const loginDataSchema = z.object({
  token: z.string().min(1),
  user: z.object({
    userId: z.union([z.string(), z.number()]),
    name: z.string().optional(),
  }),
});

export interface EcoflowSession {
  token: string;
  userId: string;
  userName: string;
}

/**
 * HTTP client for the EcoFlow cloud API.
 *
 * Stateless: the caller owns the session token and decides when to
 * re-authorize.
 */
@Injectable()
export class EcoflowClient {
  private readonly logger = new Logger(EcoflowClient.name);
  private readonly settings: PowerOceanSettings;

  constructor(configService: ConfigService) {
    this.settings = readPowerOceanSettings(configService);
  }

  /**
   * Log in with the configured account.
   *
   * @throws AuthenticationFailedError if the login answer lacks token or user
   * @throws EcoflowApiError / EcoflowConnectionError on transport failure
   */
  async authorize(): Promise<EcoflowSession> {
    const url = this.settings.authUrl;
    this.logger.log(`Login to EcoFlow API ${url}`);

    const envelope = await this.request(url, {
      method: 'POST',
      headers: { lang: 'en_US', 'content-type': 'application/json' },
      body: JSON.stringify({
        email: this.settings.username,
        password: Buffer.from(this.settings.password).toString('base64'),
        scene: 'IOT_APP',
        userType: 'ECOFLOW',
      }),
    });

    const login = loginDataSchema.safeParse(envelope.data);
    if (!login.success) {
      throw new AuthenticationFailedError(
        `Login response lacks ${login.error.issues
          .map((issue) => issue.path.join('.'))
          .join(', ')}`,
      );
    }

    const userName = login.data.user.name ?? '<no user name>';
    this.logger.log(`Successfully logged in: ${userName}`);

    return {
      token: login.data.token,
      userId: String(login.data.user.userId),
      userName,
    };
  }

  /**
   * Fetch the raw device detail document for one serial.
   */
  async fetchDeviceDetail(
    serial: string,
    token: string,
  ): Promise<EcoflowEnvelope> {
    const url = `${this.settings.apiUrl}/provider-service/user/device/detail?sn=${encodeURIComponent(serial)}`;
    const envelope = await this.request(url, {
      method: 'GET',
      headers: { authorization: `Bearer ${token}` },
    });
    this.logger.debug(`Device detail received for ${serial}`);
    return envelope;
  }

  private async request(url: string, init: RequestInit): Promise<EcoflowEnvelope> {
    let response: Response;
    try {
      response = await fetch(url, {
        ...init,
        signal: AbortSignal.timeout(this.settings.requestTimeoutMs),
      });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      const connectionError = new EcoflowConnectionError(url, cause);
      this.logger.warn(connectionError.message);
      throw connectionError;
    }

    return this.parseEnvelope(response);
  }

  /**
   * Validate status, JSON body and the `message: "success"` marker.
   */
  private async parseEnvelope(response: Response): Promise<EcoflowEnvelope> {
    const text = await response.text();

    if (response.status !== 200) {
      throw new EcoflowApiError(
        `Got HTTP status code ${response.status}: ${text}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new EcoflowApiError(
        `Failed to parse response: ${text} Error: ${error instanceof Error ? error.message : String(error)}`,
        response.status,
      );
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new EcoflowApiError(
        `Failed to extract message from ${text}`,
        response.status,
      );
    }

    if (envelope.data.message.toLowerCase() !== 'success') {
      throw new EcoflowApiError(envelope.data.message, response.status);
    }

    return envelope.data;
  }
}
