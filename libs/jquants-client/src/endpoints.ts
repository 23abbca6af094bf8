/**
 * J-Quants GET endpoints: path relative to the API base and the body field
 * holding the record array on every page.
 */
export const ENDPOINTS = {
  listed_info: { path: 'listed/info', resultKey: 'info' },
  daily_quotes: { path: 'prices/daily_quotes', resultKey: 'daily_quotes' },
  fins_statements: { path: 'fins/statements', resultKey: 'statements' },
  fins_announcement: { path: 'fins/announcement', resultKey: 'announcement' },
  fins_dividend: { path: 'fins/dividend', resultKey: 'dividend' },
  index_option: { path: 'option/index_option', resultKey: 'index_option' },
  trades_spec: { path: 'markets/trades_spec', resultKey: 'trades_spec' },
  weekly_margin_interest: {
    path: 'markets/weekly_margin_interest',
    resultKey: 'weekly_margin_interest',
  },
  short_selling: { path: 'markets/short_selling', resultKey: 'short_selling' },
  breakdown: { path: 'markets/breakdown', resultKey: 'breakdown' },
  topix: { path: 'indices/topix', resultKey: 'topix' },
} as const satisfies Record<string, EndpointDefinition>;

export interface EndpointDefinition {
  path: string;
  resultKey: string;
}

export type EndpointId = keyof typeof ENDPOINTS;

/** Query parameters the endpoints accept. Dates are `YYYYMMDD` or `YYYY-MM-DD`. */
export type EndpointQuery = {
  code?: string;
  date?: string;
  from?: string;
  to?: string;
  section?: string;
  sector33code?: string;
};
