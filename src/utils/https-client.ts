// https-client.ts
// Minimal GET over node https, resolving (never rejecting) with status, headers and body

import * as https from 'https';
import type { HeaderMap } from './rate-limiter';

export interface HttpResponse {
  statusCode: number;
  headers: HeaderMap;
  body: string;
}

export interface HttpError {
  error: string;
}

export type HttpGet = (url: string, timeoutMs: number) => Promise<HttpResponse | HttpError>;

export function isHttpError(result: HttpResponse | HttpError): result is HttpError {
  return 'error' in result;
}

const DEFAULT_HEADERS = {
  'User-Agent': 'crafting-profit-scanner/0.1',
  Accept: 'application/json',
};

export const httpsGet: HttpGet = (url, timeoutMs) =>
  new Promise((resolve) => {
    const request = https.get(url, { headers: DEFAULT_HEADERS }, (res) => {
      let data = '';

      res.setEncoding('utf8');
      res.on('data', (chunk: string) => {
        data += chunk;
      });

      res.on('end', () => {
        resolve({
          statusCode: res.statusCode ?? 0,
          headers: res.headers,
          body: data,
        });
      });

      res.on('error', (err) => {
        resolve({ error: err.message });
      });
    });

    request.on('error', (err) => {
      resolve({ error: err.message });
    });

    request.setTimeout(timeoutMs, () => {
      request.destroy();
      resolve({ error: 'Timeout' });
    });
  });
