export {
  WealthsimpleClient,
  createWealthsimpleClient,
  DEFAULT_BASE_URL,
  type WealthsimpleClientOptions,
} from './lib/wealthsimple/client';
export {
  HttpSession,
  type HttpMethod,
  type HttpSessionOptions,
  type QueryParams,
  type SendOptions,
  type SessionResponse,
} from './lib/wealthsimple/session';
export {
  WealthsimpleError,
  AuthenticationError,
  NotFoundError,
  RemoteError,
  RECORD_NOT_FOUND,
  isRecordNotFound,
} from './lib/wealthsimple/errors';
export { generateOtp } from './lib/wealthsimple/totp';
export { resolveCredentials, loadEnv, CredentialsSchema, CREDENTIAL_ENV_KEYS, type Credentials } from './lib/config/env';
export { createLogger, type Logger, type LogContext, type LogLevel } from './lib/utils/logger';
export * from './lib/wealthsimple/types';
