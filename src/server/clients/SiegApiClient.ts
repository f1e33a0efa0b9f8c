/**
 * SiegApiClient - Client for the SIEG bulk XML download API
 *
 * Each call returns up to `Take` documents issued inside a time window, every document a
 * base64-encoded XML string. Windows are paged with `Skip` until a short page comes back.
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { RateLimiter } from './RateLimiter.js';
import { logger } from '../utils/logger.js';
import { retryWithBackoff } from '../utils/retry.js';
import type { RetryConfig } from '../utils/retry.js';
import type { TimeWindow } from '../utils/dateUtils.js';
import { requireSiegApiKey, validateEnv } from '../config/env.js';
import { ExternalServiceError } from '../types/errors.js';

/**
 * Document types accepted by the API's `XmlType` field
 */
export enum XmlType {
  NFe = 1,
  CTe = 2,
  NFSe = 3,
  NFCe = 4,
  CFe = 5,
}

export const XML_TYPE_NAMES: Readonly<Record<XmlType, string>> = {
  [XmlType.NFe]: 'NFe',
  [XmlType.CTe]: 'CTe',
  [XmlType.NFSe]: 'NFSe',
  [XmlType.NFCe]: 'NFCe',
  [XmlType.CFe]: 'CFe',
};

const XML_TYPES: readonly XmlType[] = [XmlType.NFe, XmlType.CTe, XmlType.NFSe, XmlType.NFCe, XmlType.CFe];

/**
 * Parse a type name such as "nfe" or "CTe"
 */
export function parseXmlType(name: string): XmlType | null {
  const normalized = name.trim().toLowerCase();
  return XML_TYPES.find(type => XML_TYPE_NAMES[type].toLowerCase() === normalized) ?? null;
}

/**
 * Body of a download request
 */
export interface SiegDownloadRequest {
  XmlType: XmlType;
  Take: number;
  Skip: number;
  DataEmissaoInicio: string;
  DataEmissaoFim: string;
  Downloadevent: boolean;
}

export interface FetchPageOptions {
  xmlType: XmlType;
  window: TimeWindow;
  take: number;
  skip: number;
  downloadEvents?: boolean;
}

/**
 * The API answers with a JSON array of base64 strings, sometimes serialized a second time
 */
export const SiegDownloadResponseSchema = z.array(z.string());

export type SiegDownloadResponse = z.infer<typeof SiegDownloadResponseSchema>;

/**
 * SIEG client configuration
 */
export interface SiegApiClientConfig {
  apiKey?: string;
  baseUrl?: string;
  pageSize?: number;
  timeout?: number;
  requestIntervalMs?: number;
  retry?: RetryConfig;
  /** Preconfigured HTTP client (tests pass a stub) */
  httpClient?: AxiosInstance;
  rateLimiter?: RateLimiter;
}

function parseJsonText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new ExternalServiceError('SIEG', 'Response body is not JSON', { length: text.length });
  }
}

function parseResponseBody(data: unknown): SiegDownloadResponse {
  const body = typeof data === 'string' ? parseJsonText(data) : data;
  const parsed = SiegDownloadResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ExternalServiceError('SIEG', 'Response is not an array of encoded documents', {
      issues: parsed.error.issues.map(issue => issue.message),
    });
  }
  return parsed.data;
}

/**
 * SiegApiClient - Client for the SIEG download API
 */
export class SiegApiClient {
  private client: AxiosInstance;
  private rateLimiter: RateLimiter;
  private readonly apiKey: string;
  private readonly pageSize: number;
  private readonly retryConfig: RetryConfig;

  constructor(config: SiegApiClientConfig = {}) {
    const env = validateEnv();

    this.apiKey = config.apiKey ?? requireSiegApiKey(env);
    this.pageSize = config.pageSize ?? env.SIEG_PAGE_SIZE;
    this.retryConfig = config.retry ?? { maxRetries: env.SIEG_MAX_RETRIES };

    this.client =
      config.httpClient ??
      axios.create({
        baseURL: config.baseUrl ?? env.SIEG_BASE_URL,
        timeout: config.timeout ?? env.SIEG_TIMEOUT_MS,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
      });

    this.rateLimiter =
      config.rateLimiter ?? RateLimiter.fromInterval(config.requestIntervalMs ?? env.SIEG_REQUEST_INTERVAL_MS);
  }

  /**
   * Fetch one page of encoded documents
   */
  async fetchPage(options: FetchPageOptions): Promise<SiegDownloadResponse> {
    const body: SiegDownloadRequest = {
      XmlType: options.xmlType,
      Take: options.take,
      Skip: options.skip,
      DataEmissaoInicio: options.window.start,
      DataEmissaoFim: options.window.end,
      Downloadevent: options.downloadEvents ?? true,
    };
    const context = `${XML_TYPE_NAMES[options.xmlType]} ${options.window.start} skip=${options.skip}`;

    const documents = await retryWithBackoff(
      async () => {
        await this.rateLimiter.acquire();
        const response = await this.client.post<unknown>('', body, {
          params: { api_key: this.apiKey },
        });
        return parseResponseBody(response.data);
      },
      this.retryConfig,
      context
    );

    logger.debug(
      { xmlType: XML_TYPE_NAMES[options.xmlType], window: options.window, skip: options.skip, count: documents.length },
      'SIEG page retrieved'
    );

    return documents;
  }

  /**
   * Fetch every document of one type in a window, page by page
   */
  async fetchWindow(xmlType: XmlType, window: TimeWindow, downloadEvents: boolean = true): Promise<string[]> {
    const documents: string[] = [];

    for (let skip = 0; ; skip += this.pageSize) {
      const page = await this.fetchPage({ xmlType, window, take: this.pageSize, skip, downloadEvents });
      documents.push(...page);
      if (page.length < this.pageSize) {
        break;
      }
    }

    logger.info(
      { xmlType: XML_TYPE_NAMES[xmlType], window, count: documents.length },
      'SIEG window retrieved'
    );

    return documents;
  }
}
