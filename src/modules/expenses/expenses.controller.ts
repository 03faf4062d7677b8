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
import { CreateExpenseDto } from './dto/create-expense.dto';
import { ExpensePeriodQueryDto } from './dto/expense-period-query.dto';
import { UpdateExpenseDto } from './dto/update-expense.dto';
import { ExpensesService } from './expenses.service';

@Controller('expenses')
export class ExpensesController {
  constructor(
    private readonly db: DatabaseService,
    private readonly expenses: ExpensesService,
  ) {}

  @Post()
  async create(@Body() dto: CreateExpenseDto) {
    return respond(await this.db.withSession((session) => this.expenses.create(session, dto)));
  }

  @Get('user/:userId')
  async findByUser(@Param('userId', ParseIntPipe) userId: number, @Query() period: ExpensePeriodQueryDto) {
    return respond(await this.db.withSession((session) => this.expenses.findByUser(session, userId, period)));
  }

  @Get('account/:accountId')
  async findByAccount(@Param('accountId', ParseIntPipe) accountId: number) {
    return respond(await this.db.withSession((session) => this.expenses.findByAccount(session, accountId)));
  }

  @Get('category/:categoryId')
  async findByCategory(@Param('categoryId', ParseIntPipe) categoryId: number) {
    return respond(await this.db.withSession((session) => this.expenses.findByCategory(session, categoryId)));
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return respond(await this.db.withSession((session) => this.expenses.findOne(session, id)));
  }

  @Put(':id')
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateExpenseDto) {
    return respond(await this.db.withSession((session) => this.expenses.update(session, id, dto)));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number) {
    respond(await this.db.withSession((session) => this.expenses.remove(session, id)));
  }
}
