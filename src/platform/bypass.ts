// ──────────────────────────────────────────
// Platform: Bypass authorization + audit trail
// ──────────────────────────────────────────

import { isDeployedEnvironment, TenancyConfig } from '../config';
import { ScopingDisabledError } from '../shared/errors';
import { LogContext, Logger } from '../shared/logger';

export type BypassOperation =
  | 'without_scoping'
  | 'with_admin_bypass'
  | 'with_tenant_bypass'
  | 'for_each_tenant'
  | 'without_scoping_readonly';

export interface BypassAttempt {
  operation: BypassOperation;
  model: string;
  caller: string;
  details?: LogContext;
}

export class BypassGuard {
  constructor(private config: TenancyConfig, private logger: Logger) {}

  bypassesDisabled(): boolean {
    return this.config.bypassesDisabled;
  }

  /** Refuses the bypass when disabled; the denial entry is the only side effect. */
  authorize(attempt: BypassAttempt): void {
    if (!this.bypassesDisabled()) return;
    this.logger.error(`[TENANT_ERROR] ${attempt.operation} denied on ${attempt.model}: bypasses are disabled`, this.entry(attempt));
    throw new ScopingDisabledError(attempt.operation, attempt.model);
  }

  recordAdminCheck(attempt: BypassAttempt, authorized: boolean): void {
    const message = `[TENANT_WARNING] Admin bypass attempt on ${attempt.model}: ${authorized ? 'authorized' : 'rejected'}`;
    const context = { ...this.entry(attempt), authorized };
    if (authorized) {
      this.logger.warn(message, context);
    } else {
      this.logger.error(message, context);
    }
  }

  /** Runs an already-authorized bypass body and audits its outcome. */
  async execute<T>(attempt: BypassAttempt, fn: () => Promise<T>): Promise<T> {
    this.logger.warn(`[TENANT_WARNING] ${attempt.operation} on ${attempt.model}`, this.entry(attempt));
    try {
      const result = await fn();
      if (isDeployedEnvironment(this.config)) {
        this.logger.warn(`[TENANT_AUDIT] ${attempt.operation} on ${attempt.model} completed in ${this.config.environment}`, this.entry(attempt));
      } else {
        this.logger.debug(`[TENANT_AUDIT] ${attempt.operation} on ${attempt.model} completed`, this.entry(attempt));
      }
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`[TENANT_ERROR] ${attempt.operation} on ${attempt.model} failed: ${message}`, this.entry(attempt));
      throw err;
    }
  }

  async run<T>(attempt: BypassAttempt, fn: () => Promise<T>): Promise<T> {
    this.authorize(attempt);
    return this.execute(attempt, fn);
  }

  private entry(attempt: BypassAttempt): LogContext {
    return {
      operation: attempt.operation,
      model: attempt.model,
      caller: attempt.caller,
      environment: this.config.environment,
      ...attempt.details,
    };
  }
}
