/**
 * Wealthsimple Trade API クライアント
 *
 * @description メール・パスワード・ワンタイムパスワードでログインし、
 * 取得したアクセストークンを Authorization ヘッダーに保持する。
 * 各メソッドは1回のリクエストを送り、JSON（または results 配列）を返す。
 *
 * - トークンの自動更新はしない（refreshToken() 後の反映は setAccessToken() で呼び出し側が行う）
 * - リトライ・レート制限・ページネーションなし
 */

import { resolveCredentials, type Credentials } from '../config/env';
import { createLogger, type LogContext, type Logger } from '../utils/logger';
import { AuthenticationError, NotFoundError, RemoteError, isRecordNotFound } from './errors';
import { HttpSession, type HttpMethod, type QueryParams, type SessionResponse } from './session';
import { generateOtp } from './totp';
import type {
  Account,
  AccountHistory,
  Activity,
  ActivityQuery,
  BankAccount,
  Deposit,
  ForexRates,
  FractionalOrderRequest,
  HistoryPeriod,
  JsonObject,
  LoginRequest,
  Order,
  Person,
  Position,
  RefreshTokenRequest,
  ResultsResponse,
  Security,
  User,
} from './types';

export const DEFAULT_BASE_URL = 'https://trade-service.wealthsimple.com/';

/** ログインレスポンスでアクセストークンを返すヘッダー */
const ACCESS_TOKEN_HEADER = 'X-Access-Token';
const AUTHORIZATION_HEADER = 'Authorization';

const DEFAULT_ACTIVITY_LIMIT = 20;

export interface WealthsimpleClientOptions extends Partial<Credentials> {
  /** ベースURL（デフォルト: DEFAULT_BASE_URL） */
  baseUrl?: string;
  /** リクエストタイムアウト（ミリ秒、省略時は fetch の既定値） */
  timeoutMs?: number;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

function hasResults<T>(body: unknown): body is ResultsResponse<T> {
  return (
    typeof body === 'object' &&
    body !== null &&
    'results' in body &&
    Array.isArray(body.results)
  );
}

export class WealthsimpleClient {
  private readonly credentials: Credentials;
  private readonly session: HttpSession;
  private readonly logger: Logger;

  /**
   * @throws {AuthenticationError} 認証情報が不足している場合（通信前）
   */
  constructor(options?: WealthsimpleClientOptions) {
    this.credentials = resolveCredentials(options);

    const logContext = { module: 'wealthsimple-client', ...options?.logContext };
    this.logger = createLogger(logContext);
    this.session = new HttpSession({
      baseUrl: options?.baseUrl ?? DEFAULT_BASE_URL,
      timeoutMs: options?.timeoutMs,
      logContext,
    });
  }

  // ============================================
  // 認証
  // ============================================

  /**
   * ログインしてアクセストークンをセッションに保存
   *
   * @throws {AuthenticationError} 401 の場合、またはトークンヘッダーがない場合
   * @throws {RemoteError} その他の失敗ステータス
   */
  async login(): Promise<void> {
    const body: LoginRequest = {
      email: this.credentials.email,
      password: this.credentials.password,
      otp: generateOtp(this.credentials.authSecretKey),
    };

    const response = await this.session.send('POST', 'auth/login', { body });

    if (response.status === 401) {
      this.logger.warn('Login rejected', { statusCode: response.status });
      throw new AuthenticationError('Invalid login credentials');
    }
    if (!response.ok) {
      throw new RemoteError(`Login failed: HTTP ${response.status}`, response.status, response.body);
    }

    const token = response.headers.get(ACCESS_TOKEN_HEADER);
    if (!token) {
      throw new AuthenticationError(`Login response did not include ${ACCESS_TOKEN_HEADER} header`);
    }

    this.session.setHeader(AUTHORIZATION_HEADER, token);
    this.logger.info('Login successful');
  }

  /**
   * 現在のアクセストークンで auth/refresh を呼ぶ
   *
   * 保存中のトークンは更新しない。新しいトークンを使う場合は setAccessToken() を呼ぶ。
   */
  async refreshToken(): Promise<JsonObject> {
    const body: RefreshTokenRequest = {
      refresh_token: this.session.getHeader(AUTHORIZATION_HEADER) ?? '',
    };

    const result = await this.session.requestJson<JsonObject>('POST', 'auth/refresh', { body });
    this.logger.info('Token refresh requested');
    return result;
  }

  getAccessToken(): string | undefined {
    return this.session.getHeader(AUTHORIZATION_HEADER);
  }

  setAccessToken(token: string): void {
    this.session.setHeader(AUTHORIZATION_HEADER, token);
    this.logger.info('Access token updated');
  }

  isAuthenticated(): boolean {
    return this.getAccessToken() !== undefined;
  }

  // ============================================
  // 内部ヘルパー
  // ============================================

  private async request<T>(method: HttpMethod, path: string, params?: QueryParams): Promise<T> {
    return this.session.requestJson<T>(method, path, { params });
  }

  /**
   * GET して results 配列を取り出す
   */
  private async requestResults<T>(path: string, params?: QueryParams): Promise<T[]> {
    const response = await this.session.send('GET', path, { params });
    return this.unwrapResults<T>(path, response);
  }

  /**
   * @throws {RemoteError} 失敗ステータス、または results がない場合
   */
  private unwrapResults<T>(path: string, response: SessionResponse): T[] {
    if (!response.ok) {
      this.logger.warn('API request failed', { path, statusCode: response.status });
      throw new RemoteError(`HTTP ${response.status} for GET ${path}`, response.status, response.body);
    }
    if (!hasResults<T>(response.body)) {
      throw new RemoteError(`Response for ${path} has no results`, response.status, response.body);
    }
    return response.body.results;
  }

  // ============================================
  // アカウント
  // ============================================

  /**
   * GET account/list
   */
  async getAccounts(): Promise<Account[]> {
    return this.requestResults<Account>('account/list');
  }

  async getAccountIds(): Promise<string[]> {
    const accounts = await this.getAccounts();
    return accounts.map((account) => account.id);
  }

  /**
   * @throws {NotFoundError} 該当IDのアカウントがない場合
   */
  async getAccount(accountId: string): Promise<Account> {
    const accounts = await this.getAccounts();
    const account = accounts.find((candidate) => candidate.id === accountId);
    if (!account) {
      throw new NotFoundError(`${accountId} does not correspond to any account`);
    }
    return account;
  }

  /**
   * GET account/history/{period}?account_id=
   *
   * @throws {NotFoundError} サーバーが "Record not found" を返した場合
   */
  async getAccountHistory(accountId: string, period: HistoryPeriod = 'all'): Promise<AccountHistory[]> {
    const path = `account/history/${encodeURIComponent(period)}`;
    const response = await this.session.send('GET', path, { params: { account_id: accountId } });

    if (isRecordNotFound(response.body)) {
      throw new NotFoundError(`${accountId} does not correspond to any account`);
    }
    return this.unwrapResults<AccountHistory>(path, response);
  }

  /**
   * GET account/positions?account_id=
   */
  async getPositions(accountId: string): Promise<Position[]> {
    return this.requestResults<Position>('account/positions', { account_id: accountId });
  }

  /**
   * GET account/activities?limit=&account_id=[&type=]
   *
   * accountIds が空なら全アカウントのアクティビティ
   */
  async getActivities(query: ActivityQuery = {}): Promise<Activity[]> {
    const { type, limit = DEFAULT_ACTIVITY_LIMIT, accountIds = [] } = query;

    return this.requestResults<Activity>('account/activities', {
      limit,
      account_id: accountIds.join(','),
      type,
    });
  }

  // ============================================
  // 注文
  // ============================================

  /**
   * GET orders（symbol 指定時は一致する注文のみ）
   */
  async getOrders(symbol?: string): Promise<Order[]> {
    const orders = await this.requestResults<Order>('orders');
    if (symbol) {
      return orders.filter((order) => order.symbol === symbol);
    }
    return orders;
  }

  /**
   * 端株を金額指定で買う（対象銘柄のみ対応）
   *
   * @param purchaseValue 購入金額（ユーザーの現地通貨）
   */
  async placeFractionalShareOrder(
    securityId: string,
    accountId: string,
    purchaseValue: number
  ): Promise<JsonObject> {
    const body: FractionalOrderRequest = {
      security_id: securityId,
      order_type: 'buy_value',
      order_sub_type: 'fractional',
      market_value: purchaseValue,
      time_in_force: 'day',
      account_id: accountId,
    };

    const result = await this.session.requestJson<JsonObject>('POST', 'orders', { body });
    this.logger.info('Fractional order placed', { securityId, accountId });
    return result;
  }

  async cancelOrder(orderId: string): Promise<JsonObject> {
    const result = await this.request<JsonObject>('DELETE', `orders/${encodeURIComponent(orderId)}`);
    this.logger.info('Order cancelled', { orderId });
    return result;
  }

  // ============================================
  // 銘柄
  // ============================================

  async getSecurity(securityId: string): Promise<Security> {
    return this.request<Security>('GET', `securities/${encodeURIComponent(securityId)}`);
  }

  /**
   * GET securities?query=
   */
  async getSecurityFromTicker(symbol: string): Promise<Security[]> {
    return this.requestResults<Security>('securities', { query: symbol });
  }

  // ============================================
  // ユーザー・入出金・為替
  // ============================================

  async getMe(): Promise<User> {
    return this.request<User>('GET', 'me');
  }

  async getPerson(): Promise<Person> {
    return this.request<Person>('GET', 'person');
  }

  async getBankAccounts(): Promise<BankAccount[]> {
    return this.requestResults<BankAccount>('bank-accounts');
  }

  async getDeposits(): Promise<Deposit[]> {
    return this.requestResults<Deposit>('deposits');
  }

  async getForex(): Promise<ForexRates> {
    return this.request<ForexRates>('GET', 'forex');
  }
}

/**
 * クライアントを作成してログインまで行う
 *
 * @throws {AuthenticationError} 認証情報の不足、またはログイン拒否
 */
export async function createWealthsimpleClient(
  options?: WealthsimpleClientOptions
): Promise<WealthsimpleClient> {
  const client = new WealthsimpleClient(options);
  await client.login();
  return client;
}
