/**
 * HTTP セッション
 *
 * @description ベースURLと永続ヘッダー（Authorization など）を保持し、
 * 1回の呼び出しで1回だけリクエストを送る。リトライはしない。
 *
 * 接続の再利用は Node.js の fetch（undici）のコネクションプールに任せる。
 * 複数の呼び出し元から同時に使ってよいが、ヘッダーの変更は以降のリクエストすべてに反映される。
 */

import { createLogger, type LogContext, type Logger } from '../utils/logger';
import { RemoteError } from './errors';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export type QueryParams = Record<string, string | number | undefined>;

export interface HttpSessionOptions {
  /** ベースURL（末尾スラッシュ付き） */
  baseUrl: string;
  /** リクエストタイムアウト（ミリ秒、省略時は fetch の既定値） */
  timeoutMs?: number;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

export interface SendOptions {
  /** クエリパラメータ（undefined と空文字は送らない） */
  params?: QueryParams;
  /** JSON ボディ */
  body?: unknown;
}

export interface SessionResponse {
  status: number;
  ok: boolean;
  headers: Headers;
  /** JSON としてパースしたボディ（空なら null） */
  body: unknown;
}

export class HttpSession {
  readonly baseUrl: string;
  private readonly timeoutMs?: number;
  private readonly headers: Record<string, string> = { Accept: 'application/json' };
  private readonly logger: Logger;

  constructor(options: HttpSessionOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.logger = createLogger({ ...options.logContext, module: 'http-session' });
  }

  getHeader(name: string): string | undefined {
    return this.headers[name];
  }

  setHeader(name: string, value: string): void {
    this.headers[name] = value;
  }

  deleteHeader(name: string): void {
    delete this.headers[name];
  }

  /**
   * ベースURLとパス・クエリパラメータからURLを構築
   */
  buildUrl(path: string, params?: QueryParams): URL {
    const url = new URL(path, this.baseUrl);

    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined && value !== '') {
          url.searchParams.append(key, String(value));
        }
      }
    }

    return url;
  }

  /**
   * リクエストを1回送り、ステータス・ヘッダー・パース済みボディを返す
   *
   * 失敗ステータスでも例外は投げない（ステータスの判定は呼び出し側）
   */
  async send(method: HttpMethod, path: string, options?: SendOptions): Promise<SessionResponse> {
    const url = this.buildUrl(path, options?.params);
    const headers: Record<string, string> = { ...this.headers };
    const requestBody = options?.body;
    if (requestBody !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const startTime = Date.now();

    let response: Response;
    try {
      response = await fetch(url.toString(), {
        method,
        headers,
        body: requestBody !== undefined ? JSON.stringify(requestBody) : undefined,
        signal: this.timeoutMs !== undefined ? AbortSignal.timeout(this.timeoutMs) : undefined,
      });
    } catch (error) {
      this.logger.error('Request failed', { method, path, error });
      throw error;
    }

    const text = await response.text();
    const body = parseBody(text, response.status, response.ok);

    this.logger.debug('API response', {
      method,
      path,
      statusCode: response.status,
      durationMs: Date.now() - startTime,
    });

    return {
      status: response.status,
      ok: response.ok,
      headers: response.headers,
      body,
    };
  }

  /**
   * リクエストを送り、成功時はボディを返す
   *
   * @throws {RemoteError} 失敗ステータスの場合（サーバーのボディを保持）
   */
  async requestJson<T>(method: HttpMethod, path: string, options?: SendOptions): Promise<T> {
    const response = await this.send(method, path, options);

    if (!response.ok) {
      this.logger.warn('API request failed', { method, path, statusCode: response.status });
      throw new RemoteError(`HTTP ${response.status} for ${method} ${path}`, response.status, response.body);
    }

    return response.body as T;
  }
}

/**
 * レスポンスボディを JSON としてパース
 *
 * 失敗レスポンスのボディが JSON でない場合は文字列のまま返す
 */
function parseBody(text: string, status: number, ok: boolean): unknown {
  if (text === '') {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    if (ok) {
      throw new RemoteError(`Invalid JSON in response (HTTP ${status})`, status, text);
    }
    return text;
  }
}
