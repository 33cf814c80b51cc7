/**
 * 構造化ロギングユーティリティ
 *
 * @description 1行1JSONのログを console に出力する
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** モジュール名 (wealthsimple-client, http-session など) */
  module?: string;
  /** HTTP メソッド */
  method?: string;
  /** リクエストパス（ベースURLからの相対） */
  path?: string;
  /** HTTP ステータスコード */
  statusCode?: number;
  /** 処理時間（ミリ秒） */
  durationMs?: number;
  /** その他のコンテキスト */
  [key: string]: unknown;
}

interface LogPayload extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  child: (additionalContext: LogContext) => Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

/**
 * 最小ログレベル（モジュールロード時に一度だけ評価）
 */
const MIN_LOG_LEVEL: LogLevel = (() => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(level)) {
    return level;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
})();

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[MIN_LOG_LEVEL];
}

/**
 * エラーオブジェクトをシリアライズ可能な形式に変換
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack?.split('\n').slice(0, 5).join('\n'), // スタックトレースを5行に制限
      ...(error.cause ? { cause: serializeError(error.cause) } : {}),
    };
  }
  return { value: String(error) };
}

/**
 * ロガーを作成
 *
 * @param defaultContext 全ログに付与するデフォルトコンテキスト
 *
 * @example
 * ```typescript
 * const logger = createLogger({ module: 'wealthsimple-client' });
 * logger.info('Login successful');
 * logger.error('Request failed', { path: 'orders', error: err });
 * ```
 */
export function createLogger(defaultContext: LogContext = {}): Logger {
  const log = (level: LogLevel, message: string, context: LogContext = {}) => {
    if (!shouldLog(level)) {
      return;
    }

    const processedContext = { ...context };
    if (processedContext.error) {
      processedContext.error = serializeError(processedContext.error);
    }

    const payload: LogPayload = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...defaultContext,
      ...processedContext,
    };

    const jsonStr = JSON.stringify(payload);

    switch (level) {
      case 'error':
        console.error(jsonStr);
        break;
      case 'warn':
        console.warn(jsonStr);
        break;
      default:
        console.log(jsonStr);
    }
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),

    /**
     * 子ロガーを作成（コンテキストを追加）
     */
    child: (additionalContext) => createLogger({ ...defaultContext, ...additionalContext }),
  };
}

/**
 * デフォルトロガー
 */
export const logger = createLogger();
