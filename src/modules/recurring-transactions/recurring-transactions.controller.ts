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
} from '@nestjs/common';
import { respond } from '../../common/http/respond';
import { DatabaseService } from '../../database/database.service';
import { RecurringTransactionDto } from './dto/recurring-transaction.dto';
import { RecurringTransactionsService } from './recurring-transactions.service';

@Controller('recurring-transactions')
export class RecurringTransactionsController {
  constructor(
    private readonly db: DatabaseService,
    private readonly recurring: RecurringTransactionsService,
  ) {}

  @Post()
  async create(@Body() dto: RecurringTransactionDto) {
    return respond(await this.db.withSession((session) => this.recurring.create(session, dto)));
  }

  @Get('account/:accountId')
  async findByAccount(@Param('accountId', ParseIntPipe) accountId: number) {
    return respond(await this.db.withSession((session) => this.recurring.findByAccount(session, accountId)));
  }

  @Get('user/:userId')
  async findByUser(@Param('userId', ParseIntPipe) userId: number) {
    return respond(await this.db.withSession((session) => this.recurring.findByUser(session, userId)));
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return respond(await this.db.withSession((session) => this.recurring.findOne(session, id)));
  }

  @Put(':id')
  async replace(@Param('id', ParseIntPipe) id: number, @Body() dto: RecurringTransactionDto) {
    return respond(await this.db.withSession((session) => this.recurring.replace(session, id, dto)));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number) {
    respond(await this.db.withSession((session) => this.recurring.remove(session, id)));
  }
}
