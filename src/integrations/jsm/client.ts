/**
 * JSM Ops Integration
 *
 * Thin REST client for the Jira Service Management Ops alert API. Decodes
 * every response into a JSON object and turns connectivity, HTTP status and
 * decoding failures into a single TransportError.
 *
 * Usage:
 *   const client = JsmOpsClient.fromConfig(config);
 *   const envelope = await client.listAlerts();
 *   await client.acknowledgeAlert('a1b2c3');
 */

import type { Logger } from 'pino';
import { ConfigError, TransportError } from '../../alerts/errors.js';
import type { AlertTransport } from '../../alerts/transport.js';
import { type Config, type JsonObject, isJsonObject } from '../../types/index.js';
import { truncateText } from '../../utils/format.js';
import { createLogger, formatError, redact } from '../../utils/logger.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export const JSM_API_ROOT = 'https://api.atlassian.com/jsm/ops/api';

export interface JsmOpsClientOptions {
  baseUrl: string;
  apiEmail?: string;
  apiToken?: string;
  bearerToken?: string;
  pageSize?: number;
  timeoutMs?: number;
  /** Include response bodies in error messages and logs. */
  logHttpBody?: boolean;
}

type HttpMethod = 'GET' | 'POST';

interface RequestOptions {
  params?: Record<string, string | number>;
  body?: JsonObject;
}

const HIDDEN_BODY = '<hidden>';

export function jsmBaseUrl(cloudId: string): string {
  return `${JSM_API_ROOT}/${encodeURIComponent(cloudId)}`;
}

// ─── JSM Ops Client ─────────────────────────────────────────────────────────

export class JsmOpsClient implements AlertTransport {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly pageSize: number;
  private readonly timeoutMs: number;
  private readonly logHttpBody: boolean;
  private readonly log: Logger;

  constructor(options: JsmOpsClientOptions) {
    this.headers = {
      'Accept': 'application/json',
      'Content-Type': 'application/json',
    };

    if (options.bearerToken) {
      this.headers['Authorization'] = `Bearer ${options.bearerToken}`;
    } else {
      if (!options.apiEmail || !options.apiToken) {
        throw new ConfigError('Missing basic auth credentials');
      }
      const credentials = Buffer.from(`${options.apiEmail}:${options.apiToken}`).toString('base64');
      this.headers['Authorization'] = `Basic ${credentials}`;
    }

    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.pageSize = options.pageSize ?? 100;
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.logHttpBody = options.logHttpBody ?? false;
    this.log = createLogger('jsm-client');

    this.log.info(
      {
        baseUrl: this.baseUrl,
        authMode: options.bearerToken ? 'bearer' : 'basic',
        pageSize: this.pageSize,
      },
      'Initialized JSM API client',
    );
  }

  static fromConfig(config: Config): JsmOpsClient {
    return new JsmOpsClient({
      baseUrl: config.jsm.base_url,
      apiEmail: config.jsm.api_email,
      apiToken: config.jsm.api_token,
      bearerToken: config.jsm.bearer_token,
      pageSize: config.jsm.page_size,
      timeoutMs: config.jsm.timeout_ms,
      logHttpBody: config.logging.http_body,
    });
  }

  async listAlerts(): Promise<JsonObject> {
    return this.requestJson('GET', '/v1/alerts', { params: { size: this.pageSize } });
  }

  async getAlert(alertId: string): Promise<JsonObject> {
    return this.requestJson('GET', `/v1/alerts/${encodeURIComponent(alertId)}`);
  }

  async acknowledgeAlert(alertId: string): Promise<void> {
    await this.requestJson('POST', `/v1/alerts/${encodeURIComponent(alertId)}/acknowledge`, { body: {} });
  }

  async closeAlert(alertId: string): Promise<void> {
    await this.requestJson('POST', `/v1/alerts/${encodeURIComponent(alertId)}/close`, { body: {} });
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private buildUrl(path: string, params?: Record<string, string | number>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async requestJson(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<JsonObject> {
    const startTime = Date.now();
    this.log.debug(
      {
        method,
        path,
        params: options.params ? redact(options.params) : null,
        bodyKeys: options.body ? Object.keys(options.body).sort() : null,
      },
      'JSM request',
    );

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await fetch(this.buildUrl(path, options.params), {
        method,
        headers: this.headers,
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      const durationMs = Date.now() - startTime;
      const reason = error instanceof Error ? error.message : String(error);
      this.log.error({ method, path, durationMs, err: formatError(error) }, 'JSM transport error');
      throw new TransportError(`${method} ${path} failed: ${reason}`, method, path, undefined, { cause: error });
    }

    const durationMs = Date.now() - startTime;

    if (!ok) {
      const errorBody = this.logHttpBody ? truncateText(text.trim()) : HIDDEN_BODY;
      this.log.error({ method, path, status, durationMs, body: errorBody }, 'JSM HTTP error');
      throw new TransportError(`${method} ${path} failed with ${status}: ${errorBody}`, method, path, status);
    }

    this.log.info({ method, path, status, durationMs }, 'JSM response');

    if (text.trim() === '') {
      return {};
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      this.log.error(
        { method, path, status, body: this.logHttpBody ? truncateText(text) : HIDDEN_BODY },
        'JSM non-JSON response',
      );
      throw new TransportError(`${method} ${path} returned non-JSON response`, method, path, status, { cause: error });
    }

    if (!isJsonObject(data)) {
      this.log.error(
        { method, path, type: Array.isArray(data) ? 'array' : typeof data },
        'JSM unexpected JSON payload type',
      );
      throw new TransportError(`${method} ${path} returned unexpected JSON payload`, method, path, status);
    }

    return data;
  }
}
