import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { respond } from '../../common/http/respond';
import { DatabaseService } from '../../database/database.service';
import { CurrenciesService } from './currencies.service';
import { CreateCurrencyDto } from './dto/create-currency.dto';

@Controller('currencies')
export class CurrenciesController {
  constructor(
    private readonly db: DatabaseService,
    private readonly currencies: CurrenciesService,
  ) {}

  @Post()
  async create(@Body() dto: CreateCurrencyDto) {
    return respond(await this.db.withSession((session) => this.currencies.create(session, dto)));
  }

  @Get()
  async findAll() {
    return respond(await this.db.withSession((session) => this.currencies.findAll(session)));
  }

  @Get(':code')
  async findOne(@Param('code') code: string) {
    return respond(await this.db.withSession((session) => this.currencies.findByCode(session, code)));
  }
}
