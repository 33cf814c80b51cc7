#!/usr/bin/env tsx
/**
 * 使用例: ログインして各エンドポイントを順に呼ぶ
 *
 * .env.local に WEALTHSIMPLE_EMAIL / WEALTHSIMPLE_PASSWORD / WEALTHSIMPLE_AUTH_SECRET_KEY を設定して実行
 *
 * Usage:
 *   npx tsx scripts/example.ts [--ticker AC]
 */

import { loadEnv } from '../src/lib/config/env';
import { createWealthsimpleClient } from '../src/lib/wealthsimple/client';
import { createLogger } from '../src/lib/utils/logger';

const logger = createLogger({ module: 'example' });

function parseTicker(args: string[]): string {
  const index = args.indexOf('--ticker');
  return index >= 0 && args[index + 1] ? args[index + 1] : 'AC';
}

async function main(): Promise<void> {
  loadEnv();
  const ticker = parseTicker(process.argv.slice(2));

  const client = await createWealthsimpleClient();

  const accounts = await client.getAccounts();
  logger.info('Accounts', { count: accounts.length });

  const ids = await client.getAccountIds();
  const firstAccountId = ids[0];
  if (firstAccountId) {
    const account = await client.getAccount(firstAccountId);
    logger.info('Account', { account });

    const history = await client.getAccountHistory(firstAccountId, '3m');
    logger.info('Account history', { count: history.length });

    const positions = await client.getPositions(firstAccountId);
    logger.info('Positions', { count: positions.length });
  }

  const orders = await client.getOrders();
  logger.info('Orders', { count: orders.length });

  const securities = await client.getSecurityFromTicker(ticker);
  logger.info('Securities from ticker', { ticker, count: securities.length });

  const activities = await client.getActivities();
  logger.info('Activities', { count: activities.length });

  logger.info('User', { user: await client.getMe() });
  logger.info('Person', { person: await client.getPerson() });

  const bankAccounts = await client.getBankAccounts();
  logger.info('Bank accounts', { count: bankAccounts.length });

  const deposits = await client.getDeposits();
  logger.info('Deposits', { count: deposits.length });

  logger.info('Forex', { forex: await client.getForex() });

  await client.refreshToken();
}

main().catch((error: unknown) => {
  logger.error('Example failed', { error });
  process.exit(1);
});
