import { Inject, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { AxiosError } from 'axios';
import { getErrorMessage } from '../../shared/error.utils';
import type { FleetConfig } from '../../config/config.types';
import { FleetRequestError } from '../fleet.errors';
import { FLEET_CONFIG } from '../fleet.tokens';

/**
 * Thin wrapper around HttpService shared by the fleet HTTP adapters.
 *
 * Adds the API key and request timeout, and turns transport failures into
 * {@link FleetRequestError}. Response bodies come back as `unknown`; each
 * adapter validates the shape it expects.
 */
@Injectable()
export class FleetHttpClient {
  private readonly logger = new Logger(FleetHttpClient.name);

  constructor(
    @Inject(FLEET_CONFIG) private readonly config: FleetConfig,
    private readonly httpService: HttpService,
  ) {}

  async get(url: string): Promise<unknown> {
    try {
      const response = await firstValueFrom(this.httpService.get<unknown>(url, this.requestOptions()));
      return response.data;
    } catch (error) {
      throw this.toRequestError('GET', url, error);
    }
  }

  async post(url: string, body: unknown): Promise<unknown> {
    try {
      const response = await firstValueFrom(this.httpService.post<unknown>(url, body, this.requestOptions()));
      return response.data;
    } catch (error) {
      throw this.toRequestError('POST', url, error);
    }
  }

  private requestOptions() {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) {
      headers['X-API-Key'] = this.config.apiKey;
    }
    return { headers, timeout: this.config.timeout };
  }

  private toRequestError(method: string, url: string, error: unknown): FleetRequestError {
    if (error instanceof AxiosError) {
      const status = error.response?.status;
      const details: string = JSON.stringify({ status, data: error.response?.data as unknown });
      this.logger.error(`${method} ${url} failed: ${error.message} ${details}`, error.stack);
      return new FleetRequestError(`${method} ${url} failed: ${error.message}`, method, url, status);
    }

    const message = getErrorMessage(error);
    this.logger.error(`${method} ${url} failed: ${message}`);
    return new FleetRequestError(`${method} ${url} failed: ${message}`, method, url);
  }
}
