// ============================================
// HTTP Client for LLM Requests
// Keep-alive agents shared by every chart generation call
// ============================================

import axios, { type AxiosInstance } from 'axios';
import http from 'http';
import https from 'https';

export function createHttpClient(baseURL: string, timeoutMs: number): AxiosInstance {
  const httpAgent = new http.Agent({
    keepAlive: true,
    keepAliveMsecs: 30000,
    maxSockets: 20,
    maxFreeSockets: 5
  });

  const httpsAgent = new https.Agent({
    keepAlive: true,
    keepAliveMsecs: 30000,
    maxSockets: 20,
    maxFreeSockets: 5
  });

  return axios.create({
    baseURL,
    httpAgent,
    httpsAgent,
    decompress: true,
    maxRedirects: 0,
    timeout: timeoutMs,
    headers: {
      'Content-Type': 'application/json',
      'Accept-Encoding': 'gzip, deflate, br'
    }
  });
}
