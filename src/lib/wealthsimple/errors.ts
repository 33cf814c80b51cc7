/**
 * Wealthsimple クライアントのエラー定義
 */

/** 該当レコードなしを示すサーバーのエラーメッセージ */
export const RECORD_NOT_FOUND = 'Record not found';

/**
 * クライアントが投げるエラーの基底クラス
 */
export class WealthsimpleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WealthsimpleError';
  }
}

/**
 * 認証エラー（認証情報の不足、またはログイン拒否）
 */
export class AuthenticationError extends WealthsimpleError {
  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/**
 * 要求したアカウント・レコードが存在しない
 */
export class NotFoundError extends WealthsimpleError {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * 上記以外の失敗レスポンス（サーバーが返したボディをそのまま保持）
 */
export class RemoteError extends WealthsimpleError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly body: unknown
  ) {
    super(message);
    this.name = 'RemoteError';
  }
}

/**
 * ボディが `{ "error": "Record not found" }` 形式かを判定
 */
export function isRecordNotFound(body: unknown): boolean {
  return (
    typeof body === 'object' &&
    body !== null &&
    'error' in body &&
    body.error === RECORD_NOT_FOUND
  );
}
