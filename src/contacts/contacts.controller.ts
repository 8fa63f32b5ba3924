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
import { ContactsService, ContactPage } from './contacts.service';
import { Contact } from './contact.entity';
import { ContactLog } from './contact-log.entity';
import { CreateContactDto } from './dto/create-contact.dto';
import { CreateContactLogDto } from './dto/create-contact-log.dto';
import { UpdateContactDto } from './dto/update-contact.dto';
import { PageQueryDto, SearchQueryDto } from '../common/pagination';

@Controller('api/contacts')
@UseGuards(ApiTokenGuard)
export class ContactsController {
  constructor(private readonly contactsService: ContactsService) {}

  @Post()
  create(@Body() dto: CreateContactDto): Promise<Contact> {
    return this.contactsService.create(dto);
  }

  @Get()
  findAll(@Query() query: PageQueryDto): Promise<ContactPage> {
    return this.contactsService.findAll(query);
  }

  @Get('search')
  search(@Query() query: SearchQueryDto): Promise<ContactPage> {
    return this.contactsService.search(query);
  }

  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number): Promise<Contact> {
    return this.contactsService.findOne(id);
  }

  @Put(':id')
  update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateContactDto,
  ): Promise<Contact> {
    return this.contactsService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    return this.contactsService.remove(id);
  }

  @Get(':id/logs')
  findLogs(@Param('id', ParseIntPipe) id: number): Promise<ContactLog[]> {
    return this.contactsService.findLogs(id);
  }

  @Post(':id/logs')
  createLog(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: CreateContactLogDto,
  ): Promise<ContactLog> {
    return this.contactsService.createLog(id, dto);
  }
}
