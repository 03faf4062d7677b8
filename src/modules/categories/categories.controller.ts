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
import { CategoriesService } from './categories.service';
import { CreateCategoryDto } from './dto/create-category.dto';
import { UpdateCategoryDto } from './dto/update-category.dto';

@Controller('categories')
export class CategoriesController {
  constructor(
    private readonly db: DatabaseService,
    private readonly categories: CategoriesService,
  ) {}

  @Post()
  async create(@Body() dto: CreateCategoryDto) {
    return respond(await this.db.withSession((session) => this.categories.create(session, dto)));
  }

  @Get()
  async findAll() {
    return respond(await this.db.withSession((session) => this.categories.findAll(session)));
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return respond(await this.db.withSession((session) => this.categories.findOne(session, id)));
  }

  @Put(':id')
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateCategoryDto) {
    return respond(await this.db.withSession((session) => this.categories.update(session, id, dto)));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number) {
    respond(await this.db.withSession((session) => this.categories.remove(session, id)));
  }
}
