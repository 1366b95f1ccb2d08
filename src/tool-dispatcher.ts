/**
 * Tool dispatcher
 *
 * Maps a validated tools/call request onto one FinanceApi operation.
 * Each tool is a variant of ToolInvocation; the switch in `run` is
 * exhaustive, so a new tool does not compile until it is routed.
 */

import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { InvalidArgumentsError, UnknownToolError } from './errors.js';
import type {
  DateRange,
  FinanceApi,
  NewTransaction,
  TransactionQuery,
  TransactionUpdate,
} from './finance-api.js';
import { ToolRegistry, type ToolName } from './tool-registry.js';

export type ToolInvocation =
  | { tool: 'get_accounts' }
  | { tool: 'get_transactions'; query: TransactionQuery }
  | { tool: 'get_budgets'; range: DateRange }
  | { tool: 'get_cashflow'; range: DateRange }
  | { tool: 'get_account_holdings'; accountId: string }
  | { tool: 'create_transaction'; transaction: NewTransaction }
  | { tool: 'update_transaction'; update: TransactionUpdate }
  | { tool: 'refresh_accounts'; accountIds?: string[] };

export function assertNever(value: never): never {
  throw new Error(`Unhandled tool invocation: ${JSON.stringify(value)}`);
}

function optionalString(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(args: Record<string, unknown>, key: string): number | undefined {
  const value = args[key];
  return typeof value === 'number' ? value : undefined;
}

function requiredString(args: Record<string, unknown>, key: string): string {
  const value = optionalString(args, key);
  if (value === undefined) {
    throw new InvalidArgumentsError(`Missing required argument(s): ${key}`);
  }
  return value;
}

function requiredNumber(args: Record<string, unknown>, key: string): number {
  const value = optionalNumber(args, key);
  if (value === undefined) {
    throw new InvalidArgumentsError(`Missing required argument(s): ${key}`);
  }
  return value;
}

function optionalStringArray(args: Record<string, unknown>, key: string): string[] | undefined {
  const value = args[key];
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === 'string');
}

function dateRange(args: Record<string, unknown>): DateRange {
  return {
    startDate: optionalString(args, 'start_date'),
    endDate: optionalString(args, 'end_date'),
  };
}

/**
 * Rename external snake_case arguments to the FinanceApi parameter shapes
 */
export function toInvocation(name: ToolName, args: Record<string, unknown>): ToolInvocation {
  switch (name) {
    case 'get_accounts':
      return { tool: name };
    case 'get_transactions':
      return {
        tool: name,
        query: {
          limit: optionalNumber(args, 'limit'),
          offset: optionalNumber(args, 'offset'),
          accountId: optionalString(args, 'account_id'),
          ...dateRange(args),
        },
      };
    case 'get_budgets':
    case 'get_cashflow':
      return { tool: name, range: dateRange(args) };
    case 'get_account_holdings':
      return { tool: name, accountId: requiredString(args, 'account_id') };
    case 'create_transaction':
      return {
        tool: name,
        transaction: {
          accountId: requiredString(args, 'account_id'),
          amount: requiredNumber(args, 'amount'),
          description: requiredString(args, 'description'),
          date: requiredString(args, 'date'),
          categoryId: optionalString(args, 'category_id'),
          merchantName: optionalString(args, 'merchant_name'),
        },
      };
    case 'update_transaction':
      return {
        tool: name,
        update: {
          transactionId: requiredString(args, 'transaction_id'),
          amount: optionalNumber(args, 'amount'),
          description: optionalString(args, 'description'),
          categoryId: optionalString(args, 'category_id'),
          date: optionalString(args, 'date'),
        },
      };
    case 'refresh_accounts':
      return { tool: name, accountIds: optionalStringArray(args, 'account_ids') };
    default:
      return assertNever(name);
  }
}

export class ToolDispatcher {
  constructor(private registry: ToolRegistry = new ToolRegistry()) {}

  listTools(): Tool[] {
    return this.registry.listTools();
  }

  /**
   * Look up and validate a tool call without touching the upstream API
   *
   * @throws InvalidArgumentsError when the name is missing or arguments fail validation
   * @throws UnknownToolError when the name is not in the catalog
   */
  prepare(name: unknown, args: unknown): ToolInvocation {
    if (typeof name !== 'string' || name === '') {
      throw new InvalidArgumentsError('Missing tool name');
    }
    if (!this.registry.has(name)) {
      throw new UnknownToolError(name);
    }

    const validated = this.registry.validateArguments(name, args);
    return toInvocation(name, validated);
  }

  /**
   * Execute a prepared invocation and wrap the result as one text block.
   * Upstream errors propagate unchanged.
   */
  async run(api: FinanceApi, invocation: ToolInvocation): Promise<CallToolResult> {
    const result = await this.execute(api, invocation);
    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify(result, null, 2),
        },
      ],
    };
  }

  async callTool(api: FinanceApi, name: unknown, args: unknown): Promise<CallToolResult> {
    return this.run(api, this.prepare(name, args));
  }

  private async execute(api: FinanceApi, invocation: ToolInvocation): Promise<unknown> {
    switch (invocation.tool) {
      case 'get_accounts':
        return api.getAccounts();
      case 'get_transactions':
        return api.getTransactions(invocation.query);
      case 'get_budgets':
        return api.getBudgets(invocation.range);
      case 'get_cashflow':
        return api.getCashflow(invocation.range);
      case 'get_account_holdings':
        return api.getAccountHoldings(invocation.accountId);
      case 'create_transaction':
        return api.createTransaction(invocation.transaction);
      case 'update_transaction':
        return api.updateTransaction(invocation.update);
      case 'refresh_accounts':
        return api.requestAccountsRefresh(invocation.accountIds);
      default:
        return assertNever(invocation);
    }
  }
}
