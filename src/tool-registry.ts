/**
 * Static tool catalog and argument validation
 *
 * Why JSON Schema: MCP clients read the schema to know which arguments a tool
 * takes, and the same schema drives Ajv validation before dispatch.
 */

import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import type { ErrorObject, ValidateFunction } from 'ajv';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { InvalidArgumentsError } from './errors.js';
import { isRecord } from './validation-utils.js';

interface PropertySchema {
  type: 'string' | 'number' | 'integer' | 'array';
  description: string;
  format?: 'date';
  minimum?: number;
  minLength?: number;
  items?: { type: 'string'; minLength?: number };
}

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, PropertySchema>;
  required?: readonly string[];
}

interface ToolSpec {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

const DATE_DESCRIPTION = 'in YYYY-MM-DD format';

export const TOOL_CATALOG = [
  {
    name: 'get_accounts',
    description: 'Get all financial accounts',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'get_transactions',
    description: 'Get transactions with optional filters. Give both start_date and end_date, or neither.',
    inputSchema: {
      type: 'object',
      properties: {
        limit: { type: 'integer', minimum: 1, description: 'Number of transactions to return (default 100)' },
        offset: { type: 'integer', minimum: 0, description: 'Number of transactions to skip (default 0)' },
        start_date: { type: 'string', format: 'date', description: `Start date ${DATE_DESCRIPTION}` },
        end_date: { type: 'string', format: 'date', description: `End date ${DATE_DESCRIPTION}` },
        account_id: { type: 'string', minLength: 1, description: 'Only return transactions for this account' },
      },
    },
  },
  {
    name: 'get_budgets',
    description: 'Get budget data for a month range. Defaults to the previous month through the next month.',
    inputSchema: {
      type: 'object',
      properties: {
        start_date: { type: 'string', format: 'date', description: `First month of the range ${DATE_DESCRIPTION}` },
        end_date: { type: 'string', format: 'date', description: `Last month of the range ${DATE_DESCRIPTION}` },
      },
    },
  },
  {
    name: 'get_cashflow',
    description: 'Get cashflow summary (income, expenses, savings). Give both start_date and end_date, or neither.',
    inputSchema: {
      type: 'object',
      properties: {
        start_date: { type: 'string', format: 'date', description: `Start date ${DATE_DESCRIPTION}` },
        end_date: { type: 'string', format: 'date', description: `End date ${DATE_DESCRIPTION}` },
      },
    },
  },
  {
    name: 'get_account_holdings',
    description: 'Get investment holdings for an account',
    inputSchema: {
      type: 'object',
      properties: {
        account_id: { type: 'string', minLength: 1, description: 'Account ID to get holdings for' },
      },
      required: ['account_id'],
    },
  },
  {
    name: 'create_transaction',
    description: 'Create a manual transaction',
    inputSchema: {
      type: 'object',
      properties: {
        account_id: { type: 'string', minLength: 1, description: 'Account to record the transaction in' },
        amount: { type: 'number', description: 'Amount; negative for expenses, positive for income' },
        description: { type: 'string', minLength: 1, description: 'Transaction description' },
        date: { type: 'string', format: 'date', description: `Transaction date ${DATE_DESCRIPTION}` },
        category_id: { type: 'string', minLength: 1, description: 'Category ID' },
        merchant_name: { type: 'string', minLength: 1, description: 'Merchant name (defaults to the description)' },
      },
      required: ['account_id', 'amount', 'description', 'date'],
    },
  },
  {
    name: 'update_transaction',
    description: 'Update an existing transaction',
    inputSchema: {
      type: 'object',
      properties: {
        transaction_id: { type: 'string', minLength: 1, description: 'Transaction ID to update' },
        amount: { type: 'number', description: 'New amount' },
        description: { type: 'string', minLength: 1, description: 'New description' },
        category_id: { type: 'string', minLength: 1, description: 'New category ID' },
        date: { type: 'string', format: 'date', description: `New date ${DATE_DESCRIPTION}` },
      },
      required: ['transaction_id'],
    },
  },
  {
    name: 'refresh_accounts',
    description: 'Request a data refresh from the linked institutions. Refreshes every account when account_ids is omitted.',
    inputSchema: {
      type: 'object',
      properties: {
        account_ids: {
          type: 'array',
          items: { type: 'string', minLength: 1 },
          description: 'Account IDs to refresh',
        },
      },
    },
  },
] as const satisfies readonly ToolSpec[];

export type ToolName = typeof TOOL_CATALOG[number]['name'];

/**
 * Turn Ajv errors into one caller-facing message.
 * Missing fields are reported together, ahead of any type or format problem.
 */
export function describeValidationErrors(errors: ErrorObject[]): string {
  const missing: string[] = [];
  const invalid: string[] = [];

  for (const error of errors) {
    if (error.keyword === 'required') {
      missing.push(String(error.params.missingProperty));
    } else {
      const field = error.instancePath ? error.instancePath.slice(1).replace(/\//g, '.') : 'arguments';
      invalid.push(`${field} ${error.message ?? 'is invalid'}`);
    }
  }

  if (missing.length > 0) {
    return `Missing required argument(s): ${missing.join(', ')}`;
  }
  return `Invalid argument(s): ${invalid.join('; ')}`;
}

function toTool(spec: ToolSpec): Tool {
  const { properties, required } = spec.inputSchema;
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: {
      type: 'object',
      properties: structuredClone(properties),
      required: required ? [...required] : undefined,
    },
  };
}

export class ToolRegistry {
  private validators = new Map<string, ValidateFunction>();

  constructor() {
    const ajv = new Ajv.default({ strict: true, allErrors: true });
    addFormats.default(ajv, ['date']);

    for (const spec of TOOL_CATALOG) {
      this.validators.set(spec.name, ajv.compile(spec.inputSchema));
    }
  }

  /**
   * Full catalog; pure and independent of any upstream session
   */
  listTools(): Tool[] {
    return TOOL_CATALOG.map(toTool);
  }

  has(name: string): name is ToolName {
    return this.validators.has(name);
  }

  /**
   * Validate raw tool arguments against the tool's input schema
   *
   * Absent arguments are treated as an empty object.
   *
   * @throws InvalidArgumentsError naming every missing field, or the type/format problems
   */
  validateArguments(name: ToolName, args: unknown): Record<string, unknown> {
    const validate = this.validators.get(name);
    if (!validate) {
      throw new InvalidArgumentsError(`No schema registered for tool: ${name}`);
    }

    const value = args ?? {};
    if (validate(value) && isRecord(value)) {
      return { ...value };
    }

    const errors = validate.errors ?? [];
    throw new InvalidArgumentsError(describeValidationErrors(errors), {
      toolName: name,
      errors: errors.map(e => ({ path: e.instancePath, keyword: e.keyword, message: e.message })),
    });
  }
}
