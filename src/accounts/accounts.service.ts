import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, FindOptionsOrder, Repository } from 'typeorm';
import { Account } from './account.entity';
import { Contact } from '../contacts/contact.entity';
import { CreateAccountDto } from './dto/create-account.dto';
import { UpdateAccountDto } from './dto/update-account.dto';
import {
  MIN_SEARCH_LENGTH,
  PageInfo,
  PageQueryDto,
  SearchQueryDto,
  pageInfo,
  toPageRequest,
} from '../common/pagination';
import { likePattern } from '../common/like-pattern';

export const ACCOUNT_SORT_FIELDS = [
  'name',
  'industry',
  'created_at',
  'updated_at',
] as const;
export type AccountSortField = (typeof ACCOUNT_SORT_FIELDS)[number];

type AccountSortColumn = 'name' | 'industry' | 'createdAt' | 'updatedAt';

const SORT_COLUMNS: Record<AccountSortField, AccountSortColumn> = {
  name: 'name',
  industry: 'industry',
  created_at: 'createdAt',
  updated_at: 'updatedAt',
};

export interface AccountPage extends PageInfo {
  accounts: Account[];
}

type AccountChanges = Partial<
  Pick<Account, 'name' | 'industry' | 'website' | 'notes'>
>;

@Injectable()
export class AccountsService {
  private readonly logger = new Logger(AccountsService.name);

  constructor(
    @InjectRepository(Account)
    private readonly accountRepository: Repository<Account>,
    @InjectRepository(Contact)
    private readonly contactRepository: Repository<Contact>,
  ) {}

  async create(dto: CreateAccountDto): Promise<Account> {
    const account = this.accountRepository.create({
      name: dto.name,
      industry: dto.industry ?? null,
      website: dto.website ?? null,
      notes: dto.notes ?? null,
    });

    const saved = await this.accountRepository.save(account);
    this.logger.log(`Account ${saved.id} created`);
    return saved;
  }

  async findAll(query: PageQueryDto): Promise<AccountPage> {
    const request = toPageRequest(query, ACCOUNT_SORT_FIELDS, 'created_at');
    const direction = request.sortOrder === 'asc' ? 'ASC' : 'DESC';

    const order: FindOptionsOrder<Account> = {};
    order[SORT_COLUMNS[request.sortBy]] = direction;
    order.id = direction;

    const [accounts, total] = await this.accountRepository.findAndCount({
      order,
      skip: (request.page - 1) * request.pageSize,
      take: request.pageSize,
    });

    return { accounts, ...pageInfo(total, request) };
  }

  /**
   * Case-insensitive substring search across name, industry, website and
   * notes. Queries shorter than three characters match nothing.
   */
  async search(query: SearchQueryDto): Promise<AccountPage> {
    const request = toPageRequest(query, ACCOUNT_SORT_FIELDS, 'created_at');
    const term = query.q.trim();

    if (term.length < MIN_SEARCH_LENGTH) {
      return { accounts: [], ...pageInfo(0, request) };
    }

    const direction = request.sortOrder === 'asc' ? 'ASC' : 'DESC';
    const pattern = likePattern(term);

    const [accounts, total] = await this.accountRepository
      .createQueryBuilder('account')
      .where(
        new Brackets((qb) => {
          for (const column of ['name', 'industry', 'website', 'notes']) {
            qb.orWhere(`LOWER(account.${column}) LIKE :pattern ESCAPE '\\'`, {
              pattern,
            });
          }
        }),
      )
      .orderBy(`account.${SORT_COLUMNS[request.sortBy]}`, direction)
      .addOrderBy('account.id', direction)
      .skip((request.page - 1) * request.pageSize)
      .take(request.pageSize)
      .getManyAndCount();

    return { accounts, ...pageInfo(total, request) };
  }

  async findOne(id: number): Promise<Account> {
    const account = await this.accountRepository.findOne({ where: { id } });
    if (!account) {
      throw new NotFoundException('Account not found');
    }
    return account;
  }

  async exists(id: number): Promise<boolean> {
    return this.accountRepository.exists({ where: { id } });
  }

  /**
   * Partial merge: fields absent from the DTO keep their stored value.
   * Written as a column-level UPDATE so it never overwrites the enrichment
   * state owned by the enrichment workflow.
   */
  async update(id: number, dto: UpdateAccountDto): Promise<Account> {
    await this.findOne(id);

    const changes: AccountChanges = {};
    if (dto.name !== undefined) changes.name = dto.name;
    if (dto.industry !== undefined) changes.industry = dto.industry;
    if (dto.website !== undefined) changes.website = dto.website;
    if (dto.notes !== undefined) changes.notes = dto.notes;

    if (Object.keys(changes).length > 0) {
      await this.accountRepository.update({ id }, changes);
      this.logger.log(
        `Account ${id} updated (${Object.keys(changes).join(', ')})`,
      );
    }

    return this.findOne(id);
  }

  /**
   * Deletes the account. Its contacts are kept and unassigned.
   */
  async remove(id: number): Promise<void> {
    await this.findOne(id);

    const unassigned = await this.contactRepository.update(
      { accountId: id },
      { accountId: null },
    );
    await this.accountRepository.delete({ id });

    this.logger.log(
      `Account ${id} deleted, ${unassigned.affected ?? 0} contact(s) unassigned`,
    );
  }

  async findContacts(id: number): Promise<Contact[]> {
    await this.findOne(id);
    return this.contactRepository.find({
      where: { accountId: id },
      order: { lastName: 'ASC', firstName: 'ASC' },
    });
  }
}
