import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { env } from '../config/env';
import { logger } from '../utils/logger';

export interface YahooClientOptions {
  baseUrl?: string;
  timeout?: number;
  adapter?: AxiosAdapter;
}

export type QueryParams = Record<string, string | number>;

export class YahooApiClient {
  private readonly axiosInstance: AxiosInstance;
  private readonly baseUrl: string;

  constructor(options: YahooClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? env.YAHOO_API_URL).replace(/\/+$/, '');

    this.axiosInstance = axios.create({
      baseURL: this.baseUrl,
      timeout: options.timeout ?? 10000,
      headers: { 'User-Agent': 'signal-vote-backtester' },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  public async get(path: string, params: QueryParams = {}): Promise<unknown> {
    try {
      const response = await this.axiosInstance.get<unknown>(path, { params });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        logger.error(
          { status: error.response?.status, data: error.response?.data, url: error.config?.url },
          'Yahoo API Request Failed',
        );
      }
      throw error;
    }
  }
}
