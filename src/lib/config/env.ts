/**
 * 認証情報と環境変数
 *
 * @description 明示的なオプションを優先し、未指定の項目は環境変数から補完する
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import { z } from 'zod';
import { AuthenticationError } from '../wealthsimple/errors';

/** 認証情報を読む環境変数 */
export const CREDENTIAL_ENV_KEYS = {
  email: 'WEALTHSIMPLE_EMAIL',
  password: 'WEALTHSIMPLE_PASSWORD',
  authSecretKey: 'WEALTHSIMPLE_AUTH_SECRET_KEY',
} as const;

export const CredentialsSchema = z.object({
  email: z.string().min(1),
  password: z.string().min(1),
  /** 認証アプリのシークレット（base32） */
  authSecretKey: z.string().min(1),
});

export type Credentials = z.infer<typeof CredentialsSchema>;

type Env = Record<string, string | undefined>;

/**
 * 認証情報を解決・検証
 *
 * @throws {AuthenticationError} いずれかの項目が空・未設定の場合
 */
export function resolveCredentials(
  options: Partial<Credentials> = {},
  env: Env = process.env
): Credentials {
  const result = CredentialsSchema.safeParse({
    email: options.email ?? env[CREDENTIAL_ENV_KEYS.email],
    password: options.password ?? env[CREDENTIAL_ENV_KEYS.password],
    authSecretKey: options.authSecretKey ?? env[CREDENTIAL_ENV_KEYS.authSecretKey],
  });

  if (!result.success) {
    const missing = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
    throw new AuthenticationError(`Missing login credentials: ${missing.join(', ')}`);
  }

  return result.data;
}

/**
 * 環境変数ロード済みフラグ（重複ロード防止）
 */
let envLoaded = false;

/**
 * dotenv ファイルを読み込む（既存の環境変数は上書きしない）
 *
 * @param path プロジェクトルートからの相対パス（デフォルト: .env.local）
 */
export function loadEnv(path: string = '.env.local'): void {
  if (envLoaded) return;

  config({ path: resolve(process.cwd(), path) });

  envLoaded = true;
}
