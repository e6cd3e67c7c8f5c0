import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  Post,
  Put,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  CreateGameSchema,
  GameListQuerySchema,
  UpdateGameSchema,
  type GameDto,
} from '@maestros/contract';
import type { AuthenticatedRequest } from '../auth/auth.types';
import { Roles } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { handleValidationError } from '../common/validation';
import { GamesService, type GameList } from './games.service';

@Controller('games')
export class GamesController {
  constructor(private readonly gamesService: GamesService) {}

  @Get()
  async list(@Query() query: Record<string, string>): Promise<GameList> {
    try {
      return await this.gamesService.list(GameListQuerySchema.parse(query));
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get(':id')
  findOne(@Param('id') id: string): Promise<GameDto> {
    return this.gamesService.findById(id);
  }

  @Post()
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  async create(@Req() req: AuthenticatedRequest, @Body() body: unknown) {
    try {
      return await this.gamesService.create(CreateGameSchema.parse(body), req.user);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Put(':id')
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  async update(
    @Param('id') id: string,
    @Req() req: AuthenticatedRequest,
    @Body() body: unknown,
  ) {
    try {
      return await this.gamesService.update(id, UpdateGameSchema.parse(body), req.user);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Delete(':id')
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  remove(@Param('id') id: string): Promise<{ message: string }> {
    return this.gamesService.remove(id);
  }
}
