import { DynamicModule, Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import type { DataSourceOptions } from 'typeorm';
import { AppConfigModule } from './config/app-config.module';
import type { Env } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { postgresOptions } from './database/data-source.options';
import { AccountsModule } from './modules/accounts/accounts.module';
import { AlertsModule } from './modules/alerts/alerts.module';
import { AuthModule } from './modules/auth/auth.module';
import { BudgetsModule } from './modules/budgets/budgets.module';
import { CategoriesModule } from './modules/categories/categories.module';
import { CurrenciesModule } from './modules/currencies/currencies.module';
import { ExpensesModule } from './modules/expenses/expenses.module';
import { GoalsModule } from './modules/goals/goals.module';
import { HealthModule } from './modules/health/health.module';
import { RecurringTransactionsModule } from './modules/recurring-transactions/recurring-transactions.module';
import { TransactionsModule } from './modules/transactions/transactions.module';
import { UsersModule } from './modules/users/users.module';

@Module({})
export class AppModule {
  /**
   * @param database defaults to PostgreSQL at `DATABASE_URL`; tests pass an in-memory SQLite source.
   */
  static register(config: Env, database: DataSourceOptions = postgresOptions(config)): DynamicModule {
    return {
      module: AppModule,
      imports: [
        AppConfigModule.forRoot(config),
        DatabaseModule.forRoot(database),
        ThrottlerModule.forRoot([
          {
            // Throttler TTL is in milliseconds
            ttl: config.THROTTLE_TTL_SECONDS * 1000,
            limit: config.THROTTLE_LIMIT,
          },
        ]),
        HealthModule,
        AuthModule,
        UsersModule,
        CurrenciesModule,
        CategoriesModule,
        AccountsModule,
        TransactionsModule,
        ExpensesModule,
        RecurringTransactionsModule,
        BudgetsModule,
        GoalsModule,
        AlertsModule,
      ],
      providers: [{ provide: APP_GUARD, useClass: ThrottlerGuard }],
    };
  }
}
