import axios, { AxiosInstance } from 'axios';

const DEFAULT_TIMEOUT_MS = Math.max(1000, parseInt(process.env.HTTP_CLIENT_TIMEOUT_MS || '10000', 10));

/**
 * Shared axios instance for upstream calls. Nothing here retries: a failed
 * request rejects once and the caller decides what it means.
 */
const httpClient: AxiosInstance = axios.create({
  timeout: DEFAULT_TIMEOUT_MS,
  maxRedirects: 0,
  validateStatus: (status) => status >= 200 && status < 300,
});

export default httpClient;
