import { Logger } from '@nestjs/common';
import type { EntityManager, QueryRunner } from 'typeorm';
import { Failure, ServiceResult, conflict, internal, invalid } from '../common/service-result';
import { classifyViolation } from './persistence-errors';

export type WorkContext = {
  /** Logger context, normally the calling service's class name. */
  scope: string;
  /** Human-readable operation, e.g. "creating goal". */
  operation: string;
  /** Identifying key included in failure logs. */
  key?: string | number;
  /** Message for a unique violation on `field`. */
  conflict?: (field: string) => string;
  /** Message for a foreign-key or check violation. */
  invalid?: string;
  /** Caller-safe message for anything else. Defaults to "Error <operation>". */
  internal?: string;
};

function describe(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) return { message: error.message, stack: error.stack };
  return { message: String(error) };
}

/**
 * One request's hold on a database connection. Acquired and released by
 * `DatabaseService.withSession`; services only run units of work on it.
 */
export class DbSession {
  constructor(private readonly runner: QueryRunner) {}

  get manager(): EntityManager {
    return this.runner.manager;
  }

  /**
   * Runs `work` inside a transaction. Commits only when it returns `ok`;
   * any failure result or thrown error rolls the transaction back.
   */
  async unitOfWork<T>(
    context: WorkContext,
    work: (manager: EntityManager) => Promise<ServiceResult<T>>,
  ): Promise<ServiceResult<T>> {
    await this.runner.startTransaction();
    try {
      const result = await work(this.runner.manager);
      if (result.kind === 'ok') {
        await this.runner.commitTransaction();
      } else {
        await this.runner.rollbackTransaction();
      }
      return result;
    } catch (err) {
      if (this.runner.isTransactionActive) {
        await this.runner.rollbackTransaction();
      }
      return this.failureFor(err, context);
    }
  }

  /** Runs a read without a transaction; thrown errors become `internal`. */
  async read<T>(context: WorkContext, work: (manager: EntityManager) => Promise<ServiceResult<T>>): Promise<ServiceResult<T>> {
    try {
      return await work(this.runner.manager);
    } catch (err) {
      return this.failureFor(err, context);
    }
  }

  private failureFor(err: unknown, context: WorkContext): Failure {
    const logger = new Logger(context.scope);
    const key = context.key !== undefined ? ` ${context.key}` : '';
    const violation = classifyViolation(err);

    switch (violation.kind) {
      case 'unique': {
        logger.warn(`Unique violation on ${violation.field} while ${context.operation}${key}`);
        const message = context.conflict
          ? context.conflict(violation.field)
          : `A record with this ${violation.field} already exists`;
        return conflict(violation.field, message);
      }
      case 'foreign_key':
      case 'check':
        logger.warn(`Constraint violation (${violation.kind}) while ${context.operation}${key}`);
        return invalid(context.invalid ?? `Invalid data while ${context.operation}`);
      case 'none': {
        const { message, stack } = describe(err);
        logger.error(`Error ${context.operation}${key}: ${message}`, stack);
        return internal(context.internal ?? `Error ${context.operation}`);
      }
    }
  }
}

/** Binds the logger scope so call sites only name the operation. */
export function contextFor(scope: string) {
  return (
    operation: string,
    key?: string | number,
    messages: Pick<WorkContext, 'conflict' | 'invalid' | 'internal'> = {},
  ): WorkContext => ({ scope, operation, key, ...messages });
}
