import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, Repository, SelectQueryBuilder } from 'typeorm';
import { Contact } from './contact.entity';
import { ContactLog } from './contact-log.entity';
import { CreateContactDto } from './dto/create-contact.dto';
import { CreateContactLogDto } from './dto/create-contact-log.dto';
import { UpdateContactDto } from './dto/update-contact.dto';
import { AccountsService } from '../accounts/accounts.service';
import {
  MIN_SEARCH_LENGTH,
  PageInfo,
  PageQueryDto,
  PageRequest,
  SearchQueryDto,
  pageInfo,
  toPageRequest,
} from '../common/pagination';
import { likePattern } from '../common/like-pattern';

export const CONTACT_SORT_FIELDS = [
  'last_name',
  'account_name',
  'created_at',
  'updated_at',
] as const;
export type ContactSortField = (typeof CONTACT_SORT_FIELDS)[number];

const SORT_COLUMNS: Record<ContactSortField, string> = {
  last_name: 'contact.lastName',
  account_name: 'account.name',
  created_at: 'contact.createdAt',
  updated_at: 'contact.updatedAt',
};

const SEARCH_COLUMNS = [
  'contact.firstName',
  'contact.lastName',
  'contact.title',
  'contact.email',
  'contact.notes',
  'account.name',
];

/** A contact as listed, flattened with the name of its account. */
export type ContactView = Omit<Contact, 'account'> & {
  accountName: string | null;
};

export interface ContactPage extends PageInfo {
  contacts: ContactView[];
}

type ContactChanges = Partial<
  Pick<
    Contact,
    | 'accountId'
    | 'firstName'
    | 'lastName'
    | 'title'
    | 'email'
    | 'linkedin'
    | 'notes'
  >
>;

export function toContactView(contact: Contact): ContactView {
  const { account, ...fields } = contact;
  return { ...fields, accountName: account?.name ?? null };
}

@Injectable()
export class ContactsService {
  private readonly logger = new Logger(ContactsService.name);

  constructor(
    @InjectRepository(Contact)
    private readonly contactRepository: Repository<Contact>,
    @InjectRepository(ContactLog)
    private readonly contactLogRepository: Repository<ContactLog>,
    private readonly accountsService: AccountsService,
  ) {}

  async create(dto: CreateContactDto): Promise<Contact> {
    await this.assertAccountExists(dto.account_id);

    const contact = this.contactRepository.create({
      accountId: dto.account_id ?? null,
      firstName: dto.first_name,
      lastName: dto.last_name,
      title: dto.title ?? null,
      email: dto.email ?? null,
      linkedin: dto.linkedin ?? null,
      notes: dto.notes ?? null,
    });

    const saved = await this.contactRepository.save(contact);
    this.logger.log(`Contact ${saved.id} created`);
    return saved;
  }

  async findAll(query: PageQueryDto): Promise<ContactPage> {
    const request = toPageRequest(query, CONTACT_SORT_FIELDS, 'created_at');
    return this.page(this.listQuery(), request);
  }

  /**
   * Case-insensitive substring search across the contact's names, title,
   * email and notes, and the name of its account.
   */
  async search(query: SearchQueryDto): Promise<ContactPage> {
    const request = toPageRequest(query, CONTACT_SORT_FIELDS, 'created_at');
    const term = query.q.trim();

    if (term.length < MIN_SEARCH_LENGTH) {
      return { contacts: [], ...pageInfo(0, request) };
    }

    const pattern = likePattern(term);
    const qb = this.listQuery().where(
      new Brackets((where) => {
        for (const column of SEARCH_COLUMNS) {
          where.orWhere(`LOWER(${column}) LIKE :pattern ESCAPE '\\'`, {
            pattern,
          });
        }
      }),
    );

    return this.page(qb, request);
  }

  async findOne(id: number): Promise<Contact> {
    const contact = await this.contactRepository.findOne({ where: { id } });
    if (!contact) {
      throw new NotFoundException('Contact not found');
    }
    return contact;
  }

  async update(id: number, dto: UpdateContactDto): Promise<Contact> {
    await this.findOne(id);
    await this.assertAccountExists(dto.account_id);

    const changes: ContactChanges = {};
    if (dto.account_id !== undefined) changes.accountId = dto.account_id;
    if (dto.first_name !== undefined) changes.firstName = dto.first_name;
    if (dto.last_name !== undefined) changes.lastName = dto.last_name;
    if (dto.title !== undefined) changes.title = dto.title;
    if (dto.email !== undefined) changes.email = dto.email;
    if (dto.linkedin !== undefined) changes.linkedin = dto.linkedin;
    if (dto.notes !== undefined) changes.notes = dto.notes;

    if (Object.keys(changes).length > 0) {
      await this.contactRepository.update({ id }, changes);
      this.logger.log(
        `Contact ${id} updated (${Object.keys(changes).join(', ')})`,
      );
    }

    return this.findOne(id);
  }

  async remove(id: number): Promise<void> {
    await this.findOne(id);
    await this.contactLogRepository.delete({ contactId: id });
    await this.contactRepository.delete({ id });
    this.logger.log(`Contact ${id} deleted`);
  }

  /** The contact's log entries, newest first. */
  async findLogs(contactId: number): Promise<ContactLog[]> {
    await this.findOne(contactId);
    return this.contactLogRepository.find({
      where: { contactId },
      order: { createdAt: 'DESC', id: 'DESC' },
    });
  }

  async createLog(
    contactId: number,
    dto: CreateContactLogDto,
  ): Promise<ContactLog> {
    await this.findOne(contactId);

    const log = this.contactLogRepository.create({
      contactId,
      subject: dto.subject,
      contactType: dto.contact_type,
      notes: dto.notes || null,
    });

    const saved = await this.contactLogRepository.save(log);
    this.logger.log(`Logged ${saved.contactType} for contact ${contactId}`);
    return saved;
  }

  private async assertAccountExists(
    accountId: number | null | undefined,
  ): Promise<void> {
    if (accountId === undefined || accountId === null) {
      return;
    }
    if (!(await this.accountsService.exists(accountId))) {
      throw new BadRequestException(`Account ${accountId} does not exist`);
    }
  }

  private listQuery(): SelectQueryBuilder<Contact> {
    return this.contactRepository
      .createQueryBuilder('contact')
      .leftJoinAndSelect('contact.account', 'account');
  }

  private async page(
    qb: SelectQueryBuilder<Contact>,
    request: PageRequest<ContactSortField>,
  ): Promise<ContactPage> {
    const direction = request.sortOrder === 'asc' ? 'ASC' : 'DESC';

    qb.orderBy(SORT_COLUMNS[request.sortBy], direction);
    if (request.sortBy === 'account_name') {
      qb.addOrderBy('contact.lastName', direction);
    }
    qb.addOrderBy('contact.id', direction);

    // Each contact joins at most one account, so offset/limit is exact
    const [contacts, total] = await qb
      .offset((request.page - 1) * request.pageSize)
      .limit(request.pageSize)
      .getManyAndCount();

    return { contacts: contacts.map(toContactView), ...pageInfo(total, request) };
  }
}
