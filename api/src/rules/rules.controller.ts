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
  CreateRuleSchema,
  RuleListQuerySchema,
  UpdateRuleSchema,
  type RuleChannelDto,
  type RuleDto,
} from '@maestros/contract';
import type { AuthenticatedRequest } from '../auth/auth.types';
import { Roles } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import { handleValidationError } from '../common/validation';
import { toRuleDto } from './rule.types';
import { RulesService, type RuleList } from './rules.service';

@Controller('rules')
export class RulesController {
  constructor(private readonly rulesService: RulesService) {}

  @Get()
  async list(@Query() query: Record<string, string>): Promise<RuleList> {
    try {
      return await this.rulesService.list(RuleListQuerySchema.parse(query));
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get('categories/channels')
  async channels(): Promise<{ channels: RuleChannelDto[] }> {
    return { channels: await this.rulesService.channels() };
  }

  @Get('manager/all')
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  managerAll(): Promise<RuleList> {
    return this.rulesService.listAll();
  }

  @Get(':id')
  async findOne(@Param('id') id: string): Promise<RuleDto> {
    return toRuleDto(await this.rulesService.findById(id));
  }

  @Post()
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  async create(@Req() req: AuthenticatedRequest, @Body() body: unknown) {
    try {
      return await this.rulesService.create(CreateRuleSchema.parse(body), req.user);
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
      return await this.rulesService.update(id, UpdateRuleSchema.parse(body), req.user);
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Delete(':id')
  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('manager', 'ceo')
  remove(@Param('id') id: string): Promise<{ message: string }> {
    return this.rulesService.remove(id);
  }
}
