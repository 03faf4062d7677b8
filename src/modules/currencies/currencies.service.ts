import { Injectable, Logger } from '@nestjs/common';
import { DbSession, contextFor } from '../../database/db-session';
import { ServiceResult, notFound, ok } from '../../common/service-result';
import { CreateCurrencyDto } from './dto/create-currency.dto';
import { Currency } from './entities/currency.entity';

@Injectable()
export class CurrenciesService {
  private readonly logger = new Logger(CurrenciesService.name);
  private readonly context = contextFor(CurrenciesService.name);

  create(session: DbSession, dto: CreateCurrencyDto): Promise<ServiceResult<Currency>> {
    const code = dto.code.toUpperCase();
    this.logger.log(`Creating currency ${code}`);

    return session.unitOfWork(
      this.context('creating currency', code, {
        conflict: () => `Currency with code ${code} already exists`,
      }),
      async (manager) => {
        const saved = await manager.save(manager.create(Currency, { code, name: dto.name, symbol: dto.symbol }));
        return ok(await manager.findOneByOrFail(Currency, { id: saved.id }));
      },
    );
  }

  findAll(session: DbSession): Promise<ServiceResult<Currency[]>> {
    return session.read(this.context('listing currencies'), async (manager) =>
      ok(await manager.find(Currency, { order: { code: 'ASC' } })),
    );
  }

  findByCode(session: DbSession, rawCode: string): Promise<ServiceResult<Currency>> {
    const code = rawCode.toUpperCase();
    return session.read(this.context('fetching currency', code), async (manager) => {
      const currency = await manager.findOneBy(Currency, { code });
      if (!currency) {
        this.logger.warn(`Currency ${code} not found`);
        return notFound(`Currency with code ${code} not found`);
      }
      return ok(currency);
    });
  }
}
