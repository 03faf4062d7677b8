import type { DataSource } from 'typeorm';
import { Account } from '../../src/modules/accounts/entities/account.entity';
import { Category } from '../../src/modules/categories/entities/category.entity';
import { Currency } from '../../src/modules/currencies/entities/currency.entity';
import { User } from '../../src/modules/users/entities/user.entity';

/** A user owning one USD checking account, plus one category. */
export async function seedOwner(dataSource: DataSource, username = 'alice') {
  const user = await dataSource.getRepository(User).save({
    username,
    email: `${username}@example.com`,
    password: 'not-a-real-hash',
  });
  const currency = await dataSource.getRepository(Currency).save({ code: 'USD', name: 'US Dollar', symbol: '$' });
  const category = await dataSource.getRepository(Category).save({ name: 'Groceries', description: null });
  const account = await dataSource.getRepository(Account).save({
    userId: user.id,
    name: 'Checking',
    type: 'checking',
    balance: 100,
    currencyId: currency.id,
  });
  return { user, currency, category, account };
}
