import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type {
  IAsyncTransport,
  RequestParams,
  TransportResponse,
} from '../../domain/ports/ITransport.js';

export interface AxiosTransportConfig {
  baseUrl: string;
  accessToken: string;
  /** Request timeout in ms */
  timeout?: number;
  /** Replaces the HTTP adapter (tests) */
  adapter?: AxiosAdapter;
}

/**
 * HTTP transport for the climate cloud API.
 * Parameters are sent form-encoded; HTTP errors reject with the axios error.
 */
export class AxiosTransport implements IAsyncTransport {
  private readonly http: AxiosInstance;

  constructor(
    config: AxiosTransportConfig,
    private readonly logger: ILogger
  ) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout ?? 10000,
      headers: {
        Authorization: `Bearer ${config.accessToken}`,
        Accept: 'application/json',
      },
      ...(config.adapter && { adapter: config.adapter }),
    });

    this.http.interceptors.response.use(
      (response) => {
        this.logger.debug('API response', {
          method: response.config.method,
          url: response.config.url,
          status: response.status,
        });
        return response;
      },
      (error: unknown) => {
        if (axios.isAxiosError(error)) {
          this.logger.debug('API request failed', {
            method: error.config?.method,
            url: error.config?.url,
            status: error.response?.status,
            code: error.code,
          });
        }
        return Promise.reject(error);
      }
    );
  }

  async post(url: string, params: RequestParams = {}): Promise<TransportResponse> {
    const response = await this.http.post<unknown>(url, new URLSearchParams(params));
    return { status: response.status, body: response.data };
  }
}
