/**
 * Upstream finance operations
 *
 * Fixed request shapes layered on SessionClient.execute. They differ only in
 * operation name, variable shape and result unwrapping.
 */

import { InvalidDateRangeError, UpstreamOperationError } from './errors.js';
import {
  OPERATION,
  GET_ACCOUNTS,
  GET_TRANSACTIONS,
  GET_BUDGETS,
  GET_CASHFLOW,
  GET_HOLDINGS,
  CREATE_TRANSACTION,
  UPDATE_TRANSACTION,
  REFRESH_ACCOUNTS,
} from './queries.js';
import type { GraphQLData, GraphQLVariables } from './session-client.js';
import { isRecord } from './validation-utils.js';

/**
 * The part of SessionClient the operations depend on
 */
export interface SessionExecutor {
  execute(operationName: string, document: string, variables?: GraphQLVariables): Promise<GraphQLData>;
}

export interface DateRange {
  startDate?: string;
  endDate?: string;
}

export interface TransactionQuery extends DateRange {
  limit?: number;
  offset?: number;
  accountId?: string;
}

export interface NewTransaction {
  accountId: string;
  amount: number;
  description: string;
  date: string;
  categoryId?: string;
  merchantName?: string;
}

export interface TransactionUpdate {
  transactionId: string;
  amount?: number;
  description?: string;
  categoryId?: string;
  date?: string;
}

interface TransactionFilters {
  search: string;
  categories: string[];
  accounts: string[];
  tags: string[];
  startDate?: string;
  endDate?: string;
}

export const DEFAULT_TRANSACTION_LIMIT = 100;

/**
 * Both ends or neither
 *
 * @throws InvalidDateRangeError when only one end is given
 */
export function requireDateRange(range: DateRange): { startDate: string; endDate: string } | undefined {
  const { startDate, endDate } = range;
  if (startDate && endDate) {
    return { startDate, endDate };
  }
  if (startDate || endDate) {
    throw new InvalidDateRangeError();
  }
  return undefined;
}

export function toIsoDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

/**
 * First day of the previous month through the last day of the next month (UTC)
 */
export function defaultBudgetRange(now: Date): { startDate: string; endDate: string } {
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth();
  return {
    startDate: toIsoDate(new Date(Date.UTC(year, month - 1, 1))),
    endDate: toIsoDate(new Date(Date.UTC(year, month + 2, 0))),
  };
}

function buildFilters(range: DateRange, accountId?: string): TransactionFilters {
  const filters: TransactionFilters = {
    search: '',
    categories: [],
    accounts: accountId ? [accountId] : [],
    tags: [],
  };

  const dates = requireDateRange(range);
  if (dates) {
    filters.startDate = dates.startDate;
    filters.endDate = dates.endDate;
  }

  return filters;
}

/**
 * Collect messages from a PayloadError (object or list of objects)
 */
function payloadErrorMessages(errors: unknown): string[] {
  if (Array.isArray(errors)) {
    return errors.flatMap(payloadErrorMessages);
  }
  if (!isRecord(errors)) {
    return [];
  }

  const messages: string[] = [];
  if (typeof errors.message === 'string' && errors.message) {
    messages.push(errors.message);
  }
  if (Array.isArray(errors.fieldErrors)) {
    for (const fieldError of errors.fieldErrors) {
      if (isRecord(fieldError) && Array.isArray(fieldError.messages)) {
        const field = typeof fieldError.field === 'string' ? fieldError.field : 'field';
        messages.push(...fieldError.messages.map(m => `${field}: ${String(m)}`));
      }
    }
  }
  return messages;
}

function requirePayload(data: GraphQLData, key: string, operationName: string): Record<string, unknown> {
  const payload = data[key];
  if (!isRecord(payload)) {
    throw new UpstreamOperationError(`GraphQL response missing ${key}`, operationName);
  }
  return payload;
}

export class FinanceApi {
  private now: () => Date;

  constructor(private session: SessionExecutor, options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async getAccounts(): Promise<GraphQLData> {
    return this.session.execute(OPERATION.GET_ACCOUNTS, GET_ACCOUNTS);
  }

  async getTransactions(query: TransactionQuery = {}): Promise<GraphQLData> {
    const filters = buildFilters(query, query.accountId);

    return this.session.execute(OPERATION.GET_TRANSACTIONS, GET_TRANSACTIONS, {
      offset: query.offset ?? 0,
      limit: query.limit ?? DEFAULT_TRANSACTION_LIMIT,
      orderBy: 'date',
      filters,
    });
  }

  async getBudgets(range: DateRange = {}): Promise<GraphQLData> {
    const dates = requireDateRange(range) ?? defaultBudgetRange(this.now());
    return this.session.execute(OPERATION.GET_BUDGETS, GET_BUDGETS, dates);
  }

  async getCashflow(range: DateRange = {}): Promise<GraphQLData> {
    const filters = buildFilters(range);
    return this.session.execute(OPERATION.GET_CASHFLOW, GET_CASHFLOW, { filters });
  }

  async getAccountHoldings(accountId: string): Promise<GraphQLData> {
    const today = toIsoDate(this.now());

    return this.session.execute(OPERATION.GET_HOLDINGS, GET_HOLDINGS, {
      input: {
        accountIds: [accountId],
        endDate: today,
        includeHiddenHoldings: true,
        startDate: today,
      },
    });
  }

  async createTransaction(transaction: NewTransaction): Promise<Record<string, unknown>> {
    const input: Record<string, unknown> = {
      date: transaction.date,
      accountId: transaction.accountId,
      amount: Math.round(transaction.amount * 100) / 100,
      merchantName: transaction.merchantName || transaction.description,
      shouldUpdateBalance: false,
    };
    if (transaction.categoryId) {
      input.categoryId = transaction.categoryId;
    }

    const data = await this.session.execute(OPERATION.CREATE_TRANSACTION, CREATE_TRANSACTION, { input });
    const payload = requirePayload(data, 'createTransaction', OPERATION.CREATE_TRANSACTION);

    const messages = payloadErrorMessages(payload.errors);
    if (messages.length > 0) {
      throw new UpstreamOperationError(
        `Create transaction failed: ${messages.join(', ')}`,
        OPERATION.CREATE_TRANSACTION,
        { errors: payload.errors }
      );
    }

    return payload;
  }

  async updateTransaction(update: TransactionUpdate): Promise<Record<string, unknown>> {
    const input: Record<string, unknown> = { id: update.transactionId };
    if (update.categoryId) {
      input.category = update.categoryId;
    }
    if (update.description) {
      input.name = update.description;
    }
    if (update.amount !== undefined) {
      input.amount = update.amount;
    }
    if (update.date) {
      input.date = update.date;
    }

    const data = await this.session.execute(OPERATION.UPDATE_TRANSACTION, UPDATE_TRANSACTION, { input });
    const payload = requirePayload(data, 'updateTransaction', OPERATION.UPDATE_TRANSACTION);

    const messages = payloadErrorMessages(payload.errors);
    if (messages.length > 0) {
      throw new UpstreamOperationError(
        `Update transaction failed: ${messages.join(', ')}`,
        OPERATION.UPDATE_TRANSACTION,
        { errors: payload.errors }
      );
    }

    return payload;
  }

  /**
   * Ask institutions to refresh account data.
   * Without explicit ids every account is refreshed.
   */
  async requestAccountsRefresh(accountIds?: string[]): Promise<Record<string, unknown>> {
    const ids = accountIds && accountIds.length > 0
      ? accountIds
      : await this.listAccountIds();

    const data = await this.session.execute(OPERATION.REFRESH_ACCOUNTS, REFRESH_ACCOUNTS, {
      input: { accountIds: ids },
    });
    const payload = requirePayload(data, 'forceRefreshAccounts', OPERATION.REFRESH_ACCOUNTS);

    if (payload.success !== true) {
      const messages = payloadErrorMessages(payload.errors);
      throw new UpstreamOperationError(
        `Refresh accounts failed: ${messages.length > 0 ? messages.join(', ') : 'upstream reported failure'}`,
        OPERATION.REFRESH_ACCOUNTS,
        { errors: payload.errors }
      );
    }

    return payload;
  }

  private async listAccountIds(): Promise<string[]> {
    const data = await this.getAccounts();
    const accounts = Array.isArray(data.accounts) ? data.accounts : [];
    return accounts.flatMap(account =>
      isRecord(account) && typeof account.id === 'string' ? [account.id] : []
    );
  }
}
