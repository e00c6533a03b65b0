import axios, { isAxiosError, type AxiosInstance } from 'axios';

export interface HttpClientOptions {
  baseURL?: string;
  timeoutMs?: number;
}

/**
 * Create an axios instance for calls to an external collaborator.
 *
 * Failed responses get their message rewritten to the status line so logs stay
 * short and never echo request bodies.
 */
export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  const client = axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs ?? 10000,
    headers: {
      'User-Agent': 'Keepsake/1.0'
    }
  });

  client.interceptors.response.use(
    response => response,
    (error: unknown) => {
      if (isAxiosError(error) && error.response) {
        error.message = `HTTP ${error.response.status}: ${error.response.statusText}`;
      }
      return Promise.reject(error);
    }
  );

  return client;
}
