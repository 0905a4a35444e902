/**
 * HSL (Digitransit) routing API client
 * Sends stop departure queries to the GraphQL endpoint
 *
 * Single attempt per call. Transport failures and non-200 statuses are
 * reported as UpstreamError; the response body is returned unvalidated.
 */

import axios, { type AxiosInstance, isAxiosError } from 'axios';
import { UpstreamError } from '../errors.js';

export interface TransitApiClientOptions {
  url: string;
  timeoutMs?: number;
  apiKey?: string;
}

export interface FetchOptions {
  correlationId?: string;
  signal?: AbortSignal;
}

export class TransitApiClient {
  private axiosClient: AxiosInstance;

  constructor(options: TransitApiClientOptions) {
    this.axiosClient = axios.create({
      baseURL: options.url,
      timeout: options.timeoutMs ?? 5000,
      headers: {
        'Content-Type': 'application/graphql',
        ...(options.apiKey ? { 'digitransit-subscription-key': options.apiKey } : {}),
      },
      // Status handling is ours: anything but 200 is BadStatus
      validateStatus: () => true,
    });
  }

  /**
   * Execute a GraphQL query against the transit API
   *
   * @param query - GraphQL document, sent as the raw request body
   * @returns Parsed JSON body of a 200 response
   * @throws UpstreamError with kind BadStatus for any non-200 status,
   *   Unreachable for connection errors, timeouts and cancellation
   */
  async fetchDepartures(query: string, options: FetchOptions = {}): Promise<unknown> {
    const headers: Record<string, string> = {};

    if (options.correlationId) {
      headers['X-Correlation-ID'] = options.correlationId;
    }

    try {
      const response = await this.axiosClient.post<unknown>('', query, {
        headers,
        signal: options.signal,
      });

      if (response.status !== 200) {
        throw new UpstreamError('BadStatus', `status code ${response.status}`, response.status);
      }

      return response.data;
    } catch (error) {
      if (error instanceof UpstreamError) {
        throw error;
      }

      if (isAxiosError(error)) {
        if (error.response) {
          throw new UpstreamError(
            'BadStatus',
            `status code ${error.response.status}`,
            error.response.status
          );
        }
        throw new UpstreamError('Unreachable', error.code ? `${error.code}: ${error.message}` : error.message);
      }

      throw error;
    }
  }
}
