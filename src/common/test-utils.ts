import axios, { AxiosInstance, InternalAxiosRequestConfig, RawAxiosResponseHeaders } from 'axios';

export interface FakeResponse {
  status: number;
  data: unknown;
  headers?: RawAxiosResponseHeaders;
}

export interface FakeHttp {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
}

/**
 * Axios instance answered in-process by `handler`. Every request config is recorded.
 */
export function fakeHttp(
  handler: (config: InternalAxiosRequestConfig) => FakeResponse | Promise<FakeResponse>
): FakeHttp {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const response = await handler(config);
      return {
        data: response.data,
        status: response.status,
        statusText: String(response.status),
        headers: response.headers ?? {},
        config,
      };
    },
  });
  return { http, requests };
}
