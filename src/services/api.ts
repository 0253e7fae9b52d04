import axios, { AxiosAdapter, AxiosError, AxiosInstance, AxiosRequestConfig, AxiosResponse, isAxiosError } from 'axios';
import { ApiError, FetchError } from '../types';
import { createLogger } from '../lib/logger';

const log = createLogger('Api');

export interface ApiClientOptions {
  baseURL: string;
  timeout?: number;
  // Replaces the HTTP transport, used to serve canned responses in tests
  adapter?: AxiosAdapter;
}

class ApiClient {
  private client: AxiosInstance;

  constructor({ baseURL, timeout = 30000, adapter }: ApiClientOptions) {
    this.client = axios.create({
      baseURL,
      timeout,
      adapter,
      responseType: 'json',
      // Reject bodies that are not valid JSON instead of handing back the raw string
      transitional: {
        silentJSONParsing: false,
        forcedJSONParsing: true,
      },
      headers: {
        Accept: 'application/json',
      },
    });

    this.setupInterceptors();
  }

  private setupInterceptors() {
    // Request interceptor
    this.client.interceptors.request.use((config) => {
      log.info(`[API Request] ${config.method?.toUpperCase()} ${this.client.getUri(config)}`, {
        params: config.params,
        timestamp: new Date().toISOString(),
      });
      return config;
    });

    // Response interceptor
    this.client.interceptors.response.use(
      (response: AxiosResponse) => {
        log.info(`[API Response] ${response.status} ${response.config.method?.toUpperCase()} ${response.config.url}`, {
          status: response.status,
          timestamp: new Date().toISOString(),
        });
        return response;
      },
      (error: unknown) => {
        const apiError = this.toApiError(error);

        log.error(`[API Error] ${apiError.statusCode ?? 'Network'} ${apiError.method} ${apiError.endpoint}`, {
          error: apiError.error,
          message: apiError.message,
          timestamp: apiError.timestamp,
        });

        return Promise.reject(new FetchError(apiError, { cause: error }));
      }
    );
  }

  private toApiError(error: unknown): ApiError {
    const timestamp = new Date().toISOString();

    if (!isAxiosError(error)) {
      return {
        error: error instanceof Error ? error.name : 'UnknownError',
        message: error instanceof Error ? error.message : String(error),
        statusCode: null,
        timestamp,
      };
    }

    // A body that fails to parse comes back with the successful response attached
    const malformed =
      error.code === AxiosError.ERR_BAD_RESPONSE && (error.response === undefined || error.response.status < 400);
    const status = malformed ? undefined : error.response?.status;

    return {
      error: error.code ?? error.name,
      message: this.getErrorMessage(status, error.code, error.message),
      statusCode: status ?? null,
      timestamp,
      endpoint: error.config ? this.client.getUri(error.config) : undefined,
      method: error.config?.method?.toUpperCase(),
      params: error.config?.params,
    };
  }

  private getErrorMessage(status: number | undefined, code: string | undefined, fallback: string): string {
    if (status === undefined) {
      if (code === AxiosError.ERR_BAD_RESPONSE) {
        return 'The search service returned a malformed response.';
      }
      if (code === AxiosError.ECONNABORTED || code === AxiosError.ETIMEDOUT) {
        return 'The search service did not answer in time.';
      }
      return `Unable to reach the search service: ${fallback}`;
    }

    switch (status) {
      case 400:
        return 'The search service rejected the query.';
      case 404:
        return 'The search endpoint was not found.';
      case 429:
        return 'Too many requests to the search service.';
      case 500:
        return 'The search service failed with an internal error.';
      case 502:
      case 503:
      case 504:
        return 'The search service is temporarily unavailable.';
      default:
        return `Search request failed with status ${status}: ${fallback}`;
    }
  }

  async get<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.client.get<T>(url, config);
    return response.data;
  }
}

export { ApiClient };
