/**
 * Wealthsimple Trade API 型定義
 *
 * @description レスポンスはサーバーが返すJSONをそのまま扱う。
 * クライアントが参照するフィールド（id, symbol, error）のみ型を明示する。
 */

// ============================================
// 共通型
// ============================================

/** 任意のJSONオブジェクト */
export type JsonObject = Record<string, unknown>;

/**
 * `results` キーで一覧を返すレスポンス
 */
export interface ResultsResponse<T> {
  results: T[];
  [key: string]: unknown;
}

/**
 * エラーレスポンス
 */
export interface ErrorResponse {
  error: string;
  [key: string]: unknown;
}

// ============================================
// 認証
// ============================================

/** POST auth/login リクエスト */
export interface LoginRequest {
  email: string;
  password: string;
  /** 6桁のワンタイムパスワード */
  otp: string;
}

/** POST auth/refresh リクエスト（現在のアクセストークンを送る） */
export interface RefreshTokenRequest {
  refresh_token: string;
}

// ============================================
// アカウント
// ============================================

export interface Account extends JsonObject {
  id: string;
}

/** 口座履歴の期間 */
export type HistoryPeriod = '1d' | '1w' | '1m' | '3m' | '1y' | 'all';

export const HISTORY_PERIODS: readonly HistoryPeriod[] = ['1d', '1w', '1m', '3m', '1y', 'all'];

export type AccountHistory = JsonObject;

export type Position = JsonObject;

export type BankAccount = JsonObject;

export type Deposit = JsonObject;

export type User = JsonObject;

export type Person = JsonObject;

export type ForexRates = JsonObject;

// ============================================
// 注文
// ============================================

export interface Order extends JsonObject {
  symbol?: string;
}

/** POST orders リクエスト（端株の金額指定買い） */
export interface FractionalOrderRequest {
  security_id: string;
  order_type: 'buy_value';
  order_sub_type: 'fractional';
  /** 購入金額（ユーザーの現地通貨） */
  market_value: number;
  time_in_force: 'day';
  account_id: string;
}

// ============================================
// 銘柄
// ============================================

export type Security = JsonObject;

// ============================================
// アクティビティ
// ============================================

export type ActivityType =
  | 'dividend'
  | 'buy'
  | 'sell'
  | 'deposit'
  | 'convert_funds'
  | 'withdrawal'
  | 'institutional_transfer'
  | 'internal_transfer'
  | 'subscription_payment'
  | 'refund'
  | 'referral_bonus'
  | 'affiliate'
  | 'asset_movement';

export type Activity = JsonObject;

export interface ActivityQuery {
  /** 種別で絞り込み */
  type?: ActivityType;
  /** 取得件数（デフォルト: 20） */
  limit?: number;
  /** 対象アカウント（省略時は全アカウント） */
  accountIds?: readonly string[];
}
