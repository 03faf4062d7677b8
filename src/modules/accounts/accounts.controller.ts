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
import { AccountsService } from './accounts.service';
import { CreateAccountDto } from './dto/create-account.dto';
import { UpdateAccountDto } from './dto/update-account.dto';

@Controller('accounts')
export class AccountsController {
  constructor(
    private readonly db: DatabaseService,
    private readonly accounts: AccountsService,
  ) {}

  @Post()
  async create(@Body() dto: CreateAccountDto) {
    return respond(await this.db.withSession((session) => this.accounts.create(session, dto)));
  }

  @Get('user/:userId')
  async findByUser(@Param('userId', ParseIntPipe) userId: number) {
    return respond(await this.db.withSession((session) => this.accounts.findByUser(session, userId)));
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return respond(await this.db.withSession((session) => this.accounts.findOne(session, id)));
  }

  @Put(':id')
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateAccountDto) {
    return respond(await this.db.withSession((session) => this.accounts.update(session, id, dto)));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number) {
    respond(await this.db.withSession((session) => this.accounts.remove(session, id)));
  }
}
