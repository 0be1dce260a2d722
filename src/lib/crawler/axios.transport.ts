/**
 * Axios Transport
 * Keep-alive connection pool shared by every request of one crawler
 */

import http from 'http';
import https from 'https';
import axios, { AxiosInstance } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';
import type { HttpTransport, TransportExchange, TransportResponse } from './http.executor';

export interface AxiosTransportOptions {
  sslVerify?: boolean;
  /** Injected client, used by tests to stub the adapter */
  client?: AxiosInstance;
}

export class AxiosTransport implements HttpTransport {
  private readonly client: AxiosInstance;
  private readonly sslVerify: boolean;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  // One tunnel agent per proxy URL
  private readonly proxyAgents: Map<string, HttpsProxyAgent<string>> = new Map();
  private closed = false;

  constructor(options: AxiosTransportOptions = {}) {
    this.sslVerify = options.sslVerify ?? true;
    this.client = options.client ?? axios.create();
    this.httpAgent = new http.Agent({ keepAlive: true });
    this.httpsAgent = new https.Agent({ keepAlive: true, rejectUnauthorized: this.sslVerify });
  }

  async send(exchange: TransportExchange, signal: AbortSignal): Promise<TransportResponse> {
    if (this.closed) {
      throw new Error('Transport is closed');
    }

    const proxyAgent = exchange.proxyUrl ? this.proxyAgent(exchange.proxyUrl) : undefined;

    const response = await this.client.request<unknown>({
      url: exchange.url,
      method: exchange.method,
      headers: exchange.headers,
      data: exchange.body,
      httpAgent: proxyAgent ?? this.httpAgent,
      httpsAgent: proxyAgent ?? this.httpsAgent,
      proxy: false,
      maxRedirects: 0,
      timeout: exchange.timeoutMs,
      signal,
      responseType: 'arraybuffer',
      validateStatus: () => true,
    });

    const headers = normalizeHeaders(response.headers);
    return {
      status: response.status,
      headers,
      body: decodeBody(response.data, headers['content-type']),
    };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    for (const agent of this.proxyAgents.values()) {
      agent.destroy();
    }
    this.proxyAgents.clear();
  }

  private proxyAgent(proxyUrl: string): HttpsProxyAgent<string> {
    let agent = this.proxyAgents.get(proxyUrl);
    if (!agent) {
      agent = new HttpsProxyAgent(proxyUrl, { keepAlive: true, rejectUnauthorized: this.sslVerify });
      this.proxyAgents.set(proxyUrl, agent);
    }
    return agent;
  }
}

/**
 * Lower-cased names; multi-valued headers joined with ", "
 */
export function normalizeHeaders(headers: object): Record<string, string> {
  const result: Record<string, string> = {};
  const entries: Array<[string, unknown]> = Object.entries(headers);
  for (const [name, value] of entries) {
    if (Array.isArray(value)) {
      result[name.toLowerCase()] = value.map(String).join(', ');
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      result[name.toLowerCase()] = String(value);
    }
  }
  return result;
}

const CHARSET_PATTERN = /charset\s*=\s*"?([^";\s]+)/i;

/**
 * Decode a response body by the charset its Content-Type declares, UTF-8
 * when it declares none or one the runtime does not know.
 */
export function decodeBody(data: unknown, contentType: string | undefined): string {
  if (typeof data === 'string') {
    return data;
  }
  if (data == null) {
    return '';
  }

  let bytes: Uint8Array;
  if (data instanceof ArrayBuffer) {
    bytes = new Uint8Array(data);
  } else if (ArrayBuffer.isView(data)) {
    bytes = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  } else {
    return String(data);
  }

  const charset = contentType?.match(CHARSET_PATTERN)?.[1];
  return decoderFor(charset).decode(bytes);
}

function decoderFor(charset: string | undefined): TextDecoder {
  if (charset) {
    try {
      return new TextDecoder(charset);
    } catch (error: unknown) {
      if (!(error instanceof RangeError)) {
        throw error;
      }
    }
  }
  return new TextDecoder('utf-8');
}
