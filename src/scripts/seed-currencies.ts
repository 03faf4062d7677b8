import 'reflect-metadata';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { z } from 'zod';
import { loadEnv } from '../config/env.validation';
import { postgresOptions } from '../database/data-source.options';
import { Currency } from '../modules/currencies/entities/currency.entity';

const currencyListSchema = z.array(
  z.object({
    code: z.string().regex(/^[A-Za-z]{3}$/),
    name: z.string().min(1).max(255),
    symbol: z.string().min(1).max(10),
  }),
);

const CURRENCIES_PATH = join(__dirname, '..', '..', 'data', 'currencies.json');
const logger = new Logger('seed-currencies');
const dataSource = new DataSource(postgresOptions(loadEnv(process.env)));

/** Inserts missing currencies and refreshes name/symbol of existing ones. */
async function ensureCurrencies() {
  const currencies = currencyListSchema.parse(JSON.parse(readFileSync(CURRENCIES_PATH, 'utf8')));
  const repo = dataSource.getRepository(Currency);

  let created = 0;
  for (const c of currencies) {
    const code = c.code.toUpperCase();
    const existing = await repo.findOneBy({ code });
    if (!existing) {
      await repo.insert({ code, name: c.name, symbol: c.symbol });
      created += 1;
    } else {
      await repo.update({ id: existing.id }, { name: c.name, symbol: c.symbol });
    }
  }
  logger.log(`${currencies.length} currencies seeded (${created} new)`);
}

async function main() {
  await dataSource.initialize();
  await ensureCurrencies();
}

void main()
  .catch((e: unknown) => {
    logger.error('seed failed', e instanceof Error ? e.stack : String(e));
    process.exitCode = 1;
  })
  .finally(async () => {
    if (dataSource.isInitialized) await dataSource.destroy();
  });
