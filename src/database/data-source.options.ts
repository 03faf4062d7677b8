import type { DataSourceOptions } from 'typeorm';
import type { Env } from '../config/env.validation';
import { Account } from '../modules/accounts/entities/account.entity';
import { Alert } from '../modules/alerts/entities/alert.entity';
import { Budget } from '../modules/budgets/entities/budget.entity';
import { Category } from '../modules/categories/entities/category.entity';
import { Currency } from '../modules/currencies/entities/currency.entity';
import { Expense } from '../modules/expenses/entities/expense.entity';
import { Goal } from '../modules/goals/entities/goal.entity';
import { RecurringTransaction } from '../modules/recurring-transactions/entities/recurring-transaction.entity';
import { Transaction } from '../modules/transactions/entities/transaction.entity';
import { UserProfile } from '../modules/users/entities/user-profile.entity';
import { User } from '../modules/users/entities/user.entity';

export const ENTITIES = [
  User,
  UserProfile,
  Currency,
  Category,
  Account,
  Transaction,
  Expense,
  RecurringTransaction,
  Budget,
  Goal,
  Alert,
];

export function postgresOptions(config: Env): DataSourceOptions {
  return {
    type: 'postgres',
    url: config.DATABASE_URL,
    entities: ENTITIES,
    synchronize: config.DB_SYNCHRONIZE,
    logging: config.DB_LOGGING,
  };
}
