/**
 * GraphQL documents sent upstream
 *
 * Each operation name must match the name declared inside its document;
 * the upstream API routes on it.
 */

export const OPERATION = {
  GET_ACCOUNTS: 'GetAccounts',
  GET_TRANSACTIONS: 'GetTransactionsList',
  GET_BUDGETS: 'Common_GetJointPlanningData',
  GET_CASHFLOW: 'Web_GetCashFlowPage',
  GET_HOLDINGS: 'Web_GetHoldings',
  CREATE_TRANSACTION: 'Common_CreateTransactionMutation',
  UPDATE_TRANSACTION: 'Web_TransactionDrawerUpdateTransaction',
  REFRESH_ACCOUNTS: 'Common_ForceRefreshAccountsMutation',
} as const;

export type OperationName = typeof OPERATION[keyof typeof OPERATION];

const PAYLOAD_ERROR_FIELDS = `
  fragment PayloadErrorFields on PayloadError {
    fieldErrors {
      field
      messages
      __typename
    }
    message
    code
    __typename
  }
`;

export const GET_ACCOUNTS = `
  query GetAccounts {
    accounts {
      ...AccountFields
      __typename
    }
    householdPreferences {
      id
      accountGroupOrder
      __typename
    }
  }

  fragment AccountFields on Account {
    id
    displayName
    syncDisabled
    deactivatedAt
    isHidden
    isAsset
    mask
    createdAt
    updatedAt
    displayLastUpdatedAt
    currentBalance
    displayBalance
    includeInNetWorth
    hideFromList
    hideTransactionsFromReports
    dataProvider
    dataProviderAccountId
    isManual
    transactionsCount
    holdingsCount
    order
    logoUrl
    type {
      name
      display
      __typename
    }
    subtype {
      name
      display
      __typename
    }
    credential {
      id
      updateRequired
      disconnectedFromDataProviderAt
      dataProvider
      institution {
        id
        name
        status
        __typename
      }
      __typename
    }
    institution {
      id
      name
      primaryColor
      url
      __typename
    }
    __typename
  }
`;

export const GET_TRANSACTIONS = `
  query GetTransactionsList($offset: Int, $limit: Int, $filters: TransactionFilterInput, $orderBy: TransactionOrdering) {
    allTransactions(filters: $filters) {
      totalCount
      results(offset: $offset, limit: $limit, orderBy: $orderBy) {
        id
        ...TransactionOverviewFields
        __typename
      }
      __typename
    }
    transactionRules {
      id
      __typename
    }
  }

  fragment TransactionOverviewFields on Transaction {
    id
    amount
    pending
    date
    hideFromReports
    plaidName
    notes
    isRecurring
    reviewStatus
    needsReview
    isSplitTransaction
    createdAt
    updatedAt
    category {
      id
      name
      __typename
    }
    merchant {
      name
      id
      transactionsCount
      __typename
    }
    account {
      id
      displayName
      __typename
    }
    tags {
      id
      name
      color
      order
      __typename
    }
    __typename
  }
`;

export const GET_BUDGETS = `
  query Common_GetJointPlanningData($startDate: Date!, $endDate: Date!) {
    budgetSystem
    budgetData(startMonth: $startDate, endMonth: $endDate) {
      monthlyAmountsByCategory {
        category {
          id
          __typename
        }
        monthlyAmounts {
          ...BudgetMonthlyAmountsFields
          __typename
        }
        __typename
      }
      monthlyAmountsByCategoryGroup {
        categoryGroup {
          id
          __typename
        }
        monthlyAmounts {
          ...BudgetMonthlyAmountsFields
          __typename
        }
        __typename
      }
      totalsByMonth {
        month
        totalIncome {
          ...BudgetTotalsFields
          __typename
        }
        totalExpenses {
          ...BudgetTotalsFields
          __typename
        }
        __typename
      }
      __typename
    }
    categoryGroups {
      id
      name
      budgetVariability
      groupLevelBudgetingEnabled
      categories {
        id
        name
        icon
        order
        budgetVariability
        excludeFromBudget
        isSystemCategory
        __typename
      }
      __typename
    }
    goalsV2 {
      id
      name
      __typename
    }
  }

  fragment BudgetMonthlyAmountsFields on BudgetMonthlyAmounts {
    month
    plannedCashFlowAmount
    plannedSetAsideAmount
    actualAmount
    remainingAmount
    previousMonthRolloverAmount
    rolloverType
    __typename
  }

  fragment BudgetTotalsFields on BudgetTotals {
    actualAmount
    plannedAmount
    previousMonthRolloverAmount
    remainingAmount
    __typename
  }
`;

export const GET_CASHFLOW = `
  query Web_GetCashFlowPage($filters: TransactionFilterInput) {
    summary: aggregates(filters: $filters, fillEmptyValues: true) {
      summary {
        sumIncome
        sumExpense
        savings
        savingsRate
        __typename
      }
      __typename
    }
  }
`;

export const GET_HOLDINGS = `
  query Web_GetHoldings($input: PortfolioInput) {
    portfolio(input: $input) {
      aggregateHoldings {
        edges {
          node {
            id
            quantity
            basis
            totalValue
            securityPriceChangeDollars
            securityPriceChangePercent
            lastSyncedAt
            holdings {
              id
              type
              typeDisplay
              name
              ticker
              closingPrice
              isManual
              closingPriceUpdatedAt
              __typename
            }
            security {
              id
              name
              type
              ticker
              typeDisplay
              currentPrice
              currentPriceUpdatedAt
              closingPrice
              closingPriceUpdatedAt
              oneDayChangePercent
              oneDayChangeDollars
              __typename
            }
            __typename
          }
          __typename
        }
        __typename
      }
      __typename
    }
  }
`;

export const CREATE_TRANSACTION = `
  mutation Common_CreateTransactionMutation($input: CreateTransactionMutationInput!) {
    createTransaction(input: $input) {
      errors {
        ...PayloadErrorFields
        __typename
      }
      transaction {
        id
        __typename
      }
      __typename
    }
  }
${PAYLOAD_ERROR_FIELDS}`;

export const UPDATE_TRANSACTION = `
  mutation Web_TransactionDrawerUpdateTransaction($input: UpdateTransactionMutationInput!) {
    updateTransaction(input: $input) {
      transaction {
        id
        amount
        pending
        date
        hideFromReports
        needsReview
        reviewedAt
        plaidName
        notes
        isRecurring
        category {
          id
          __typename
        }
        merchant {
          id
          name
          __typename
        }
        __typename
      }
      errors {
        ...PayloadErrorFields
        __typename
      }
      __typename
    }
  }
${PAYLOAD_ERROR_FIELDS}`;

export const REFRESH_ACCOUNTS = `
  mutation Common_ForceRefreshAccountsMutation($input: ForceRefreshAccountsInput!) {
    forceRefreshAccounts(input: $input) {
      success
      errors {
        ...PayloadErrorFields
        __typename
      }
      __typename
    }
  }
${PAYLOAD_ERROR_FIELDS}`;
