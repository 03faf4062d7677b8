import { Injectable, Logger } from '@nestjs/common';
import { DbSession, contextFor } from '../../database/db-session';
import { ServiceResult, notFound, ok } from '../../common/service-result';
import { CreateAccountDto } from './dto/create-account.dto';
import { UpdateAccountDto } from './dto/update-account.dto';
import { Account } from './entities/account.entity';

const missing = (id: number) => notFound(`Account with ID ${id} not found`);

@Injectable()
export class AccountsService {
  private readonly logger = new Logger(AccountsService.name);
  private readonly context = contextFor(AccountsService.name);

  create(session: DbSession, dto: CreateAccountDto): Promise<ServiceResult<Account>> {
    return session.unitOfWork(
      this.context('creating account', dto.name, {
        invalid: 'Invalid account data. Check userId and currencyId exist.',
      }),
      async (manager) => {
        const saved = await manager.save(
          manager.create(Account, {
            userId: dto.userId,
            name: dto.name,
            type: dto.type,
            balance: dto.balance ?? 0,
            currencyId: dto.currencyId,
          }),
        );
        this.logger.log(`Created account ${saved.id} for user ${dto.userId}`);
        return ok(await manager.findOneByOrFail(Account, { id: saved.id }));
      },
    );
  }

  findByUser(session: DbSession, userId: number): Promise<ServiceResult<Account[]>> {
    return session.read(this.context('listing accounts for user', userId), async (manager) =>
      ok(await manager.find(Account, { where: { userId }, order: { id: 'ASC' } })),
    );
  }

  findOne(session: DbSession, id: number): Promise<ServiceResult<Account>> {
    return session.read(this.context('fetching account', id), async (manager) => {
      const account = await manager.findOneBy(Account, { id });
      return account ? ok(account) : missing(id);
    });
  }

  update(session: DbSession, id: number, dto: UpdateAccountDto): Promise<ServiceResult<Account>> {
    return session.unitOfWork(
      this.context('updating account', id, { invalid: 'Invalid account data. Check currencyId exists.' }),
      async (manager) => {
        const account = await manager.findOneBy(Account, { id });
        if (!account) return missing(id);

        if (dto.name !== undefined) account.name = dto.name;
        if (dto.type !== undefined) account.type = dto.type;
        if (dto.balance !== undefined) account.balance = dto.balance;
        if (dto.currencyId !== undefined) account.currencyId = dto.currencyId;
        await manager.save(account);
        return ok(await manager.findOneByOrFail(Account, { id }));
      },
    );
  }

  remove(session: DbSession, id: number): Promise<ServiceResult<void>> {
    return session.unitOfWork(
      this.context('deleting account', id, {
        invalid: 'Account is still used by transactions, expenses or recurring transactions',
      }),
      async (manager) => {
        if (!(await manager.existsBy(Account, { id }))) return missing(id);

        await manager.delete(Account, { id });
        this.logger.log(`Deleted account ${id}`);
        return ok(undefined);
      },
    );
  }
}
