import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { respond } from '../../common/http/respond';
import { DatabaseService } from '../../database/database.service';
import { CreateTransactionDto } from './dto/create-transaction.dto';
import { DateRangeQueryDto } from './dto/date-range-query.dto';
import { UpdateTransactionDto } from './dto/update-transaction.dto';
import { TransactionsService } from './transactions.service';

@Controller('transactions')
export class TransactionsController {
  constructor(
    private readonly db: DatabaseService,
    private readonly transactions: TransactionsService,
  ) {}

  @Post()
  async create(@Body() dto: CreateTransactionDto) {
    return respond(await this.db.withSession((session) => this.transactions.create(session, dto)));
  }

  @Get('account/:accountId')
  async findByAccount(@Param('accountId', ParseIntPipe) accountId: number) {
    return respond(await this.db.withSession((session) => this.transactions.findByAccount(session, accountId)));
  }

  @Get('user/:userId')
  async findByUser(@Param('userId', ParseIntPipe) userId: number) {
    return respond(await this.db.withSession((session) => this.transactions.findByUser(session, userId)));
  }

  @Get('date-range')
  async findByDateRange(@Query() query: DateRangeQueryDto) {
    return respond(await this.db.withSession((session) => this.transactions.findByDateRange(session, query)));
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return respond(await this.db.withSession((session) => this.transactions.findOne(session, id)));
  }

  @Put(':id')
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateTransactionDto) {
    return respond(await this.db.withSession((session) => this.transactions.update(session, id, dto)));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number) {
    respond(await this.db.withSession((session) => this.transactions.remove(session, id)));
  }
}
