/**
 * 二段階認証用ワンタイムパスワード
 *
 * @description RFC 6238 の既定値（SHA-1, 30秒ステップ, 6桁）。
 * シークレットは認証アプリに登録する base32 文字列。
 */

import { authenticator } from 'otplib';

/**
 * 指定時刻のワンタイムパスワードを生成
 *
 * @param secret base32 エンコードされたシークレット
 * @param epochMs 基準時刻（UNIXミリ秒、デフォルト: 現在時刻）
 */
export function generateOtp(secret: string, epochMs: number = Date.now()): string {
  return authenticator.clone({ epoch: epochMs }).generate(secret);
}
