/**
 * @module config
 *
 * Process configuration read from the environment once, on first access.
 *
 * ```typescript
 * import { ConfigService } from '@irkit/ir';
 *
 * if (ConfigService.getInstance().verifyAfterRewrite) {
 *   module.verify();
 * }
 * ```
 */

import { LogLevel } from './logger.js';

export class ConfigService {
  private static instance: ConfigService | null = null;

  /** Minimum level written by loggers (IRKIT_LOG_LEVEL, default WARN) */
  readonly logLevel: LogLevel;

  /** Run verify hooks after a rewrite driver finishes (IRKIT_VERIFY_AFTER_REWRITE=1) */
  readonly verifyAfterRewrite: boolean;

  /** Log every applied pattern at debug level (IRKIT_TRACE_REWRITES=1) */
  readonly traceRewrites: boolean;

  private constructor(env: NodeJS.ProcessEnv) {
    this.logLevel = parseLogLevel(env.IRKIT_LOG_LEVEL);
    this.verifyAfterRewrite = env.IRKIT_VERIFY_AFTER_REWRITE === '1';
    this.traceRewrites = env.IRKIT_TRACE_REWRITES === '1';
  }

  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService(process.env);
    }
    return ConfigService.instance;
  }

  /**
   * Drop the cached instance so the next getInstance() re-reads the environment.
   * Tests only.
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = LogLevel.WARN): LogLevel {
  switch (raw?.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return fallback;
  }
}
