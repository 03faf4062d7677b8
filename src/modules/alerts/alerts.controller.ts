import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { respond } from '../../common/http/respond';
import { DatabaseService } from '../../database/database.service';
import { AlertsService } from './alerts.service';
import { CreateAlertDto } from './dto/create-alert.dto';
import { ListAlertsQueryDto } from './dto/list-alerts-query.dto';
import { UpdateAlertDto } from './dto/update-alert.dto';

@Controller('alerts')
export class AlertsController {
  constructor(
    private readonly db: DatabaseService,
    private readonly alerts: AlertsService,
  ) {}

  @Post()
  async create(@Body() dto: CreateAlertDto) {
    return respond(await this.db.withSession((session) => this.alerts.create(session, dto)));
  }

  @Get('user/:userId')
  async findByUser(@Param('userId', ParseIntPipe) userId: number, @Query() query: ListAlertsQueryDto) {
    return respond(
      await this.db.withSession((session) => this.alerts.findByUser(session, userId, query.unreadOnly ?? false)),
    );
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return respond(await this.db.withSession((session) => this.alerts.findOne(session, id)));
  }

  @Patch(':id/read')
  async markRead(@Param('id', ParseIntPipe) id: number) {
    return respond(await this.db.withSession((session) => this.alerts.markRead(session, id)));
  }

  @Put(':id')
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateAlertDto) {
    return respond(await this.db.withSession((session) => this.alerts.update(session, id, dto)));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number) {
    respond(await this.db.withSession((session) => this.alerts.remove(session, id)));
  }
}
