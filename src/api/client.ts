/**
 * Control-panel REST client
 * - Reads (app lookup, account info) are validated and throw ApiCallFailedError
 * - Writes (mark installed, create notice) never throw; they return a
 *   NotificationResult that is logged and otherwise left to the caller
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { ApiCallFailedError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
  API_BASE_PATH,
  AccountInfoResponseSchema,
  AppReadResponseSchema,
  NOTICE_TYPE_DEFAULT,
} from './types.js';
import type {
  AccountInfo,
  FetchLike,
  InstalledPayload,
  NoticePayload,
  NotificationResult,
  ServerInfo,
} from './types.js';

export interface ControlPanelClientOptions {
  apiBaseUrl: string;
  authToken: string;
  fetch?: FetchLike;
}

export class ControlPanelClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;

  constructor(options: ControlPanelClientOptions) {
    this.baseUrl = options.apiBaseUrl.replace(/\/+$/, '') + API_BASE_PATH;
    this.headers = {
      'Content-Type': 'application/json',
      Authorization: `Token ${options.authToken}`,
    };
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * GET /app/read/{uuid}: confirms the app exists and resolves its server
   */
  async lookupApp(uuid: string): Promise<ServerInfo> {
    const body = await this.getJson(
      'UUID validation and server lookup',
      `/app/read/${encodeURIComponent(uuid)}`,
      AppReadResponseSchema
    );
    return { serverId: body.server };
  }

  /**
   * GET /account/info/: resolves the account owner's email
   */
  async lookupAccount(): Promise<AccountInfo> {
    const body = await this.getJson('Admin email lookup', '/account/info/', AccountInfoResponseSchema);
    return { email: body.email };
  }

  async markInstalled(uuid: string): Promise<NotificationResult> {
    const payload: InstalledPayload = [{ id: uuid }];
    return this.postBestEffort('Mark app installed', '/app/installed/', payload);
  }

  async createNotice(content: string): Promise<NotificationResult> {
    const payload: NoticePayload = [{ type: NOTICE_TYPE_DEFAULT, content }];
    return this.postBestEffort('Create notice', '/notice/create/', payload);
  }

  private async getJson<T>(
    operation: string,
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): Promise<T> {
    const logger = getLogger();
    const url = this.baseUrl + path;
    logger.debug(`GET ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method: 'GET', headers: this.headers });
    } catch (error) {
      throw ApiCallFailedError.fromNetwork(operation, error);
    }

    const text = await response.text();
    if (!response.ok) {
      throw ApiCallFailedError.fromStatus(operation, response.status, text);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw ApiCallFailedError.fromInvalidBody(operation, 'not valid JSON');
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw ApiCallFailedError.fromInvalidBody(operation, reason);
    }

    logger.success(`${operation} OK.`);
    return parsed.data;
  }

  private async postBestEffort(
    operation: string,
    path: string,
    payload: unknown
  ): Promise<NotificationResult> {
    const logger = getLogger();
    const url = this.baseUrl + path;
    logger.debug(`POST ${url}`);

    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify(payload),
      });
      if (!response.ok) {
        logger.warn(`${operation} returned HTTP ${response.status}`);
        return { ok: false, status: response.status };
      }
      logger.debug(`${operation} OK (HTTP ${response.status})`);
      return { ok: true, status: response.status };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`${operation} failed: ${message}`);
      return { ok: false, error: message };
    }
  }
}
