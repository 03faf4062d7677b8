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
import { CreateGoalDto } from './dto/create-goal.dto';
import { ListGoalsQueryDto } from './dto/list-goals-query.dto';
import { UpdateGoalProgressDto } from './dto/update-goal-progress.dto';
import { UpdateGoalDto } from './dto/update-goal.dto';
import { GoalsService } from './goals.service';

@Controller('goals')
export class GoalsController {
  constructor(
    private readonly db: DatabaseService,
    private readonly goals: GoalsService,
  ) {}

  @Post()
  async create(@Body() dto: CreateGoalDto) {
    return respond(await this.db.withSession((session) => this.goals.create(session, dto)));
  }

  @Get('user/:userId')
  async findByUser(@Param('userId', ParseIntPipe) userId: number, @Query() query: ListGoalsQueryDto) {
    return respond(await this.db.withSession((session) => this.goals.findByUser(session, userId, query.status)));
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return respond(await this.db.withSession((session) => this.goals.findOne(session, id)));
  }

  @Patch(':id/progress')
  async updateProgress(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateGoalProgressDto) {
    return respond(
      await this.db.withSession((session) => this.goals.updateProgress(session, id, dto.currentAmount)),
    );
  }

  @Put(':id')
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateGoalDto) {
    return respond(await this.db.withSession((session) => this.goals.update(session, id, dto)));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number) {
    respond(await this.db.withSession((session) => this.goals.remove(session, id)));
  }
}
