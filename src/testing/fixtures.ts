/**
 * Upstream response fixtures
 *
 * Why: Small, made-up payloads shaped like the upstream GraphQL responses.
 * Enables integration tests without real API calls.
 */

export const mockAccounts = {
  accounts: [
    {
      id: 'acc-checking-1',
      displayName: 'Everyday Checking',
      currentBalance: 1520.45,
      isAsset: true,
      type: { name: 'depository', display: 'Cash', __typename: 'AccountType' },
      __typename: 'Account',
    },
    {
      id: 'acc-brokerage-2',
      displayName: 'Brokerage',
      currentBalance: 10250,
      isAsset: true,
      type: { name: 'brokerage', display: 'Investments', __typename: 'AccountType' },
      __typename: 'Account',
    },
  ],
  householdPreferences: { id: 'hh-1', accountGroupOrder: [], __typename: 'HouseholdPreferences' },
};

export const mockTransactions = {
  allTransactions: {
    totalCount: 1,
    results: [
      {
        id: 'txn-100',
        amount: -42.5,
        date: '2024-03-14',
        merchant: { id: 'mer-1', name: 'Corner Grocery', __typename: 'Merchant' },
        category: { id: 'cat-food', name: 'Groceries', __typename: 'Category' },
        account: { id: 'acc-checking-1', displayName: 'Everyday Checking', __typename: 'Account' },
        __typename: 'Transaction',
      },
    ],
    __typename: 'TransactionList',
  },
  transactionRules: [],
};

export const mockBudgets = {
  budgetSystem: 'fixed_and_flex',
  budgetData: {
    monthlyAmountsByCategory: [],
    monthlyAmountsByCategoryGroup: [],
    totalsByMonth: [],
    __typename: 'BudgetData',
  },
  categoryGroups: [],
  goalsV2: [],
};

export const mockCashflow = {
  summary: [
    {
      summary: { sumIncome: 5000, sumExpense: -3200, savings: 1800, savingsRate: 0.36, __typename: 'TransactionsSummary' },
      __typename: 'AggregateData',
    },
  ],
};

export const mockHoldings = {
  portfolio: {
    aggregateHoldings: {
      edges: [
        {
          node: {
            id: 'hold-1',
            quantity: 10,
            basis: 900,
            totalValue: 1100,
            security: { id: 'sec-1', name: 'Example Index Fund', ticker: 'EXIF', __typename: 'Security' },
            __typename: 'AggregateHolding',
          },
          __typename: 'AggregateHoldingEdge',
        },
      ],
      __typename: 'AggregateHoldingConnection',
    },
    __typename: 'Portfolio',
  },
};

export const mockCreateTransaction = {
  createTransaction: {
    errors: null,
    transaction: { id: 'txn-new-1', __typename: 'Transaction' },
    __typename: 'CreateTransactionMutation',
  },
};

export const mockUpdateTransaction = {
  updateTransaction: {
    transaction: { id: 'txn-100', amount: -45, date: '2024-03-15', __typename: 'Transaction' },
    errors: null,
    __typename: 'UpdateTransactionMutation',
  },
};

export const mockRefreshAccounts = {
  forceRefreshAccounts: {
    success: true,
    errors: null,
    __typename: 'ForceRefreshAccountsMutation',
  },
};

/**
 * Default `data` per upstream operation name
 */
export const graphqlFixtures: Record<string, Record<string, unknown>> = {
  GetAccounts: mockAccounts,
  GetTransactionsList: mockTransactions,
  Common_GetJointPlanningData: mockBudgets,
  Web_GetCashFlowPage: mockCashflow,
  Web_GetHoldings: mockHoldings,
  Common_CreateTransactionMutation: mockCreateTransaction,
  Web_TransactionDrawerUpdateTransaction: mockUpdateTransaction,
  Common_ForceRefreshAccountsMutation: mockRefreshAccounts,
};
