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
import { BudgetsService } from './budgets.service';
import { CreateBudgetDto } from './dto/create-budget.dto';
import { UpdateBudgetDto } from './dto/update-budget.dto';

@Controller('budgets')
export class BudgetsController {
  constructor(
    private readonly db: DatabaseService,
    private readonly budgets: BudgetsService,
  ) {}

  @Post()
  async create(@Body() dto: CreateBudgetDto) {
    return respond(await this.db.withSession((session) => this.budgets.create(session, dto)));
  }

  @Get('user/:userId')
  async findByUser(@Param('userId', ParseIntPipe) userId: number) {
    return respond(await this.db.withSession((session) => this.budgets.findByUser(session, userId)));
  }

  @Get('category/:categoryId')
  async findByCategory(@Param('categoryId', ParseIntPipe) categoryId: number) {
    return respond(await this.db.withSession((session) => this.budgets.findByCategory(session, categoryId)));
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return respond(await this.db.withSession((session) => this.budgets.findOne(session, id)));
  }

  @Put(':id')
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateBudgetDto) {
    return respond(await this.db.withSession((session) => this.budgets.update(session, id, dto)));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number) {
    respond(await this.db.withSession((session) => this.budgets.remove(session, id)));
  }
}
