/**
 * Ledger Service
 *
 * Bootstrap + lifecycle management for the relayer-facing HTTP service.
 *
 * Lifecycle:
 * - On startup: wire event sinks (log, optional Postgres, optional webhook),
 *   pick the token backend, build the ledger, start HTTP
 * - On shutdown: stop accepting requests, drain the ledger's queue, close
 *   the database pool
 *
 * Token backend: with RPC_URL, STABLECOIN_ADDRESS and LEDGER_PRIVATE_KEY set
 * the ledger moves a real ERC-20 from its own wallet. Without them it runs
 * on an in-process token that starts empty; DEV_FUNDED_ACCOUNTS mints to and
 * approves the ledger for the listed accounts so intents can be tried out.
 */

// Load environment variables from .env file
import 'dotenv/config';

import type { Server } from 'node:http';
import express, { Express } from 'express';
import cors from 'cors';
import { Pool } from 'pg';
import { JsonRpcProvider, MaxUint256, Wallet, getAddress, isAddress } from 'ethers';

import { ConfigError } from './boundaries/errors.js';
import { SystemClock } from './execution/clock.js';
import { InMemoryStablecoin } from './adapters/stablecoin.js';
import { InMemoryBridgeNetwork, type BridgeTransport } from './adapters/bridge-adapter.js';
import { Erc20Stablecoin, EthersBridgeTransport } from './adapters/ethers-chain.js';
import type { Stablecoin } from './adapters/stablecoin.js';
import {
  FanOutEventSink,
  LoggerEventSink,
  PostgresEventSink,
  WebhookEventSink,
  type LedgerEventSink,
} from './ledger/events.js';
import { GasCreditLedger, createGasCreditLedger, type GasCreditLedgerConfig } from './ledger/credit-ledger.js';
import { MAX_FEE_BPS, PURCHASE_FEE_BPS, REFUND_FEE_BPS } from './ledger/constants.js';
import { ConsoleMetrics, NoOpMetrics } from './observability/metrics.js';
import { createRoutes, errorHandler } from './http/index.js';
import { createLogger, isLogLevel, type Logger, type LogLevel } from './utils/index.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface ChainConfig {
  rpcUrl: string;
  stablecoinAddress: string;
  privateKey: string;
  confirmations: number;
}

export interface DevFundingConfig {
  accounts: string[];
  amount: bigint;
}

export interface LedgerServerConfig {
  // Server
  port: number;
  host: string;

  // Ledger
  ledger: GasCreditLedgerConfig;

  // Token backend (in-process when absent)
  chain?: ChainConfig;
  devFunding?: DevFundingConfig;

  // Event delivery
  databaseUrl?: string;
  eventWebhookUrl?: string;

  // Observability
  logLevel: LogLevel;
  consoleMetrics: boolean;
}

type Env = Record<string, string | undefined>;

function required(env: Env, variable: string): string {
  const value = env[variable]?.trim();
  if (!value) {
    throw new ConfigError(variable, 'is required');
  }
  return value;
}

function optional(env: Env, variable: string): string | undefined {
  const value = env[variable]?.trim();
  return value ? value : undefined;
}

function parseInteger(env: Env, variable: string, fallback: number, min: number, max: number): number {
  const raw = optional(env, variable);
  if (raw === undefined) return fallback;
  if (!/^[0-9]+$/.test(raw)) {
    throw new ConfigError(variable, `expected an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ConfigError(variable, `must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function parseAddressList(env: Env, variable: string): string[] {
  const entries = (optional(env, variable) ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  for (const entry of entries) {
    if (!isAddress(entry)) {
      throw new ConfigError(variable, `not a valid address: ${entry}`);
    }
  }
  return entries.map((entry) => getAddress(entry));
}

/**
 * All three chain variables or none. The key must control LEDGER_ADDRESS.
 */
function loadChainConfig(env: Env, ledgerAddress: string): ChainConfig | undefined {
  const rpcUrl = optional(env, 'RPC_URL');
  const stablecoinAddress = optional(env, 'STABLECOIN_ADDRESS');
  const privateKey = optional(env, 'LEDGER_PRIVATE_KEY');
  if (rpcUrl === undefined && stablecoinAddress === undefined && privateKey === undefined) {
    return undefined;
  }
  if (rpcUrl === undefined) throw new ConfigError('RPC_URL', 'is required with an on-chain stablecoin');
  if (stablecoinAddress === undefined) {
    throw new ConfigError('STABLECOIN_ADDRESS', 'is required with an on-chain stablecoin');
  }
  if (privateKey === undefined) {
    throw new ConfigError('LEDGER_PRIVATE_KEY', 'is required with an on-chain stablecoin');
  }
  if (!isAddress(stablecoinAddress)) {
    throw new ConfigError('STABLECOIN_ADDRESS', `not a valid address: ${stablecoinAddress}`);
  }

  let signerAddress: string;
  try {
    signerAddress = new Wallet(privateKey).address;
  } catch {
    throw new ConfigError('LEDGER_PRIVATE_KEY', 'not a valid private key');
  }
  if (!isAddress(ledgerAddress) || getAddress(ledgerAddress) !== signerAddress) {
    throw new ConfigError('LEDGER_PRIVATE_KEY', `controls ${signerAddress}, not LEDGER_ADDRESS`);
  }

  return {
    rpcUrl,
    stablecoinAddress: getAddress(stablecoinAddress),
    privateKey,
    confirmations: parseInteger(env, 'CONFIRMATIONS', 1, 1, 64),
  };
}

function loadDevFunding(env: Env): DevFundingConfig | undefined {
  const accounts = parseAddressList(env, 'DEV_FUNDED_ACCOUNTS');
  if (accounts.length === 0) return undefined;

  const amount = optional(env, 'DEV_FUND_AMOUNT') ?? '1000000000';
  if (!/^[0-9]+$/.test(amount)) {
    throw new ConfigError('DEV_FUND_AMOUNT', `expected an integer, got "${amount}"`);
  }
  return { accounts, amount: BigInt(amount) };
}

export function loadConfigFromEnv(env: Env = process.env): LedgerServerConfig {
  const logLevel = optional(env, 'LOG_LEVEL') ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError('LOG_LEVEL', `unknown level "${logLevel}"`);
  }

  const ledgerAddress = required(env, 'LEDGER_ADDRESS');
  const chain = loadChainConfig(env, ledgerAddress);
  const devFunding = loadDevFunding(env);
  if (chain && devFunding) {
    throw new ConfigError('DEV_FUNDED_ACCOUNTS', 'only applies to the in-process stablecoin');
  }

  return {
    port: parseInteger(env, 'PORT', 3000, 0, 65_535),
    host: optional(env, 'HOST') ?? '0.0.0.0',
    ledger: {
      address: ledgerAddress,
      owner: required(env, 'OWNER_ADDRESS'),
      relayer: required(env, 'RELAYER_ADDRESS'),
      feeRecipient: required(env, 'FEE_RECIPIENT_ADDRESS'),
      bridgeAggregator: optional(env, 'BRIDGE_AGGREGATOR_ADDRESS'),
      supportedChains: (optional(env, 'SUPPORTED_CHAINS') ?? '')
        .split(',')
        .map((chain) => chain.trim())
        .filter((chain) => chain.length > 0),
      purchaseFeeBps: parseInteger(env, 'PURCHASE_FEE_BPS', PURCHASE_FEE_BPS, 0, MAX_FEE_BPS),
      refundFeeBps: parseInteger(env, 'REFUND_FEE_BPS', REFUND_FEE_BPS, 0, MAX_FEE_BPS),
    },
    chain,
    devFunding,
    databaseUrl: optional(env, 'DATABASE_URL'),
    eventWebhookUrl: optional(env, 'EVENT_WEBHOOK_URL'),
    logLevel,
    consoleMetrics: optional(env, 'CONSOLE_METRICS') === 'true',
  };
}

// =============================================================================
// LEDGER SERVER
// =============================================================================

export interface LedgerServerDeps {
  stablecoin?: Stablecoin;
  bridgeTransport?: BridgeTransport;
  logger?: Logger;
}

export class LedgerServer {
  readonly ledger: GasCreditLedger;

  private config: LedgerServerConfig;
  private logger: Logger;
  private app: Express;
  private devToken?: InMemoryStablecoin;
  private pool?: Pool;
  private postgresSink?: PostgresEventSink;
  private server?: Server;
  private shutdownPromise?: Promise<void>;

  constructor(config: LedgerServerConfig, deps: LedgerServerDeps = {}) {
    this.config = config;
    this.logger = deps.logger ?? createLogger({ level: config.logLevel, service: 'ledger' });
    this.app = express();

    const sinks: LedgerEventSink[] = [new LoggerEventSink(this.logger.child({ component: 'events' }))];
    if (config.databaseUrl) {
      this.pool = new Pool({ connectionString: config.databaseUrl });
      this.postgresSink = new PostgresEventSink(this.pool, this.logger);
      sinks.push(this.postgresSink);
    }
    if (config.eventWebhookUrl) {
      sinks.push(new WebhookEventSink(config.eventWebhookUrl, this.logger));
    }

    const backend = this.createBackend(deps);
    this.ledger = createGasCreditLedger(config.ledger, {
      stablecoin: backend.stablecoin,
      bridgeTransport: backend.bridgeTransport,
      clock: new SystemClock(),
      eventSink: sinks.length === 1 ? sinks[0] : new FanOutEventSink(sinks),
      logger: this.logger,
      metrics: config.consoleMetrics ? new ConsoleMetrics() : new NoOpMetrics(),
    });
  }

  private createBackend(deps: LedgerServerDeps): { stablecoin: Stablecoin; bridgeTransport: BridgeTransport } {
    const chain = this.config.chain;
    if (chain) {
      const provider = new JsonRpcProvider(chain.rpcUrl);
      const wallet = new Wallet(chain.privateKey, provider);
      const logger = this.logger.child({ component: 'chain' });
      return {
        stablecoin: deps.stablecoin ?? new Erc20Stablecoin(chain.stablecoinAddress, wallet, logger, chain.confirmations),
        bridgeTransport: deps.bridgeTransport ?? new EthersBridgeTransport(wallet, logger, chain.confirmations),
      };
    }

    let stablecoin = deps.stablecoin;
    if (!stablecoin) {
      this.devToken = new InMemoryStablecoin();
      stablecoin = this.devToken;
    }
    return {
      stablecoin,
      bridgeTransport: deps.bridgeTransport ?? new InMemoryBridgeNetwork(),
    };
  }

  /**
   * Start the service.
   *
   * 1. Ensure the event table exists (when Postgres is configured)
   * 2. Fund dev accounts (in-process token only)
   * 3. Mount routes
   * 4. Start HTTP server
   */
  async start(): Promise<void> {
    this.logger.info({}, 'Starting ledger service...');

    if (this.postgresSink) {
      await this.postgresSink.ensureSchema();
      this.logger.info({}, 'Event table ready');
    }

    if (this.devToken) {
      this.logger.warn({}, 'Running on an in-process stablecoin; balances are lost on restart');
      await this.fundDevAccounts(this.devToken);
    }

    const settings = await this.ledger.getSettings();
    this.app.use(cors());
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(
      createRoutes(
        this.ledger,
        { relayer: settings.relayer, now: () => Math.floor(Date.now() / 1000) },
        this.logger
      )
    );
    this.app.use(errorHandler(this.logger));

    await new Promise<void>((resolve) => {
      this.server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info(
          { port: this.address()?.port ?? this.config.port, host: this.config.host, ledger: this.ledger.address },
          'Ledger HTTP server started'
        );
        resolve();
      });
    });
  }

  private async fundDevAccounts(token: InMemoryStablecoin): Promise<void> {
    const funding = this.config.devFunding;
    if (!funding) return;

    for (const account of funding.accounts) {
      token.mint(account, funding.amount);
      await token.approve(account, this.ledger.address, MaxUint256);
    }
    this.logger.info({ accounts: funding.accounts, amount: funding.amount }, 'Dev accounts funded');
  }

  /**
   * Bound address; the real port when configured with 0.
   */
  address(): { host: string; port: number } | null {
    const bound = this.server?.address();
    if (!bound || typeof bound === 'string') return null;
    return { host: bound.address, port: bound.port };
  }

  /**
   * Stop the service gracefully.
   *
   * Queued ledger calls finish before the database pool closes.
   */
  async stop(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = this.doStop();
    return this.shutdownPromise;
  }

  private async doStop(): Promise<void> {
    this.logger.info({}, 'Stopping ledger service...');

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      this.logger.info({}, 'HTTP server stopped');
    }

    await this.ledger.drain();

    if (this.pool) {
      await this.pool.end();
      this.logger.info({}, 'Database connections closed');
    }

    this.logger.info({}, 'Ledger service stopped');
  }

  setupShutdownHandlers(): void {
    const shutdown = async (signal: string) => {
      this.logger.info({ signal }, 'Received shutdown signal');
      await this.stop();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  }
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const server = new LedgerServer(config);
  await server.start();
  server.setupShutdownHandlers();
}

// Run if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
