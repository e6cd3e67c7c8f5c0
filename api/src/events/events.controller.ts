import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  CreateEventSchema,
  EventListQuerySchema,
  UpdateEventSchema,
  type EventDto,
} from '@maestros/contract';
import type { AuthenticatedRequest } from '../auth/auth.types';
import { AdminGuard } from '../auth/admin.guard';
import { Roles } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { handleValidationError } from '../common/validation';
import { toEventDto } from './event.types';
import {
  EventsService,
  type ManagerEventDto,
  type RegistrationResult,
} from './events.service';

const UPCOMING_DEFAULT_LIMIT = 5;

@Controller('events')
export class EventsController {
  constructor(private readonly eventsService: EventsService) {}

  @Post('create')
  @UseGuards(AuthGuard('jwt'), AdminGuard)
  async create(@Req() req: AuthenticatedRequest, @Body() body: unknown) {
    try {
      const dto = CreateEventSchema.parse(body);
      return await this.eventsService.create(dto, req.user);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('list')
  async list(@Query() query: Record<string, string>): Promise<{ events: EventDto[] }> {
    try {
      const dto = EventListQuerySchema.parse(query);
      return { events: await this.eventsService.list(dto) };
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('upcoming/list')
  async upcoming(@Query('limit') limit?: string): Promise<{ events: EventDto[] }> {
    const parsed = Number.parseInt(limit ?? '', 10);
    return {
      events: await this.eventsService.findUpcoming(
        Number.isNaN(parsed) || parsed < 1 ? UPCOMING_DEFAULT_LIMIT : parsed,
      ),
    };
  }

  @Get('manager/all')
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  managerAll(): Promise<{ events: ManagerEventDto[]; count: number }> {
    return this.eventsService.listForManager();
  }

  @Get(':id')
  async findOne(@Param('id') id: string): Promise<{ event: EventDto }> {
    return { event: toEventDto(await this.eventsService.findById(id)) };
  }

  @Post(':id/register')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'))
  register(
    @Param('id') id: string,
    @Req() req: AuthenticatedRequest,
  ): Promise<RegistrationResult> {
    return this.eventsService.register(id, req.user);
  }

  @Post(':id/unregister')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard('jwt'))
  unregister(
    @Param('id') id: string,
    @Req() req: AuthenticatedRequest,
  ): Promise<{ message: string }> {
    return this.eventsService.unregister(id, req.user);
  }

  @Put('manager/:id')
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  async update(
    @Param('id') id: string,
    @Req() req: AuthenticatedRequest,
    @Body() body: unknown,
  ) {
    try {
      const dto = UpdateEventSchema.parse(body);
      return await this.eventsService.update(id, dto, req.user);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Delete('manager/:id')
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  remove(@Param('id') id: string): Promise<{ message: string }> {
    return this.eventsService.remove(id);
  }
}
