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
  UseGuards,
} from '@nestjs/common';
import { ApiTokenGuard } from '../auth/api-token.guard';
import { AccountsService, AccountPage } from './accounts.service';
import { Account } from './account.entity';
import { Contact } from '../contacts/contact.entity';
import { CreateAccountDto } from './dto/create-account.dto';
import { UpdateAccountDto } from './dto/update-account.dto';
import { PageQueryDto, SearchQueryDto } from '../common/pagination';

@Controller('api/accounts')
@UseGuards(ApiTokenGuard)
export class AccountsController {
  constructor(private readonly accountsService: AccountsService) {}

  @Post()
  create(@Body() dto: CreateAccountDto): Promise<Account> {
    return this.accountsService.create(dto);
  }

  @Get()
  findAll(@Query() query: PageQueryDto): Promise<AccountPage> {
    return this.accountsService.findAll(query);
  }

  @Get('search')
  search(@Query() query: SearchQueryDto): Promise<AccountPage> {
    return this.accountsService.search(query);
  }

  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number): Promise<Account> {
    return this.accountsService.findOne(id);
  }

  @Put(':id')
  update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateAccountDto,
  ): Promise<Account> {
    return this.accountsService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    return this.accountsService.remove(id);
  }

  @Get(':id/contacts')
  findContacts(@Param('id', ParseIntPipe) id: number): Promise<Contact[]> {
    return this.accountsService.findContacts(id);
  }
}
