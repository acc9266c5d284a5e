export type ExchangeMode = 'mock' | 'ccxt' | 'rest';

export type MarketType = 'futures' | 'spot';

export interface ExchangeCredentials {
  apiKey: string;
  apiSecret: string;
}

/**
 * Supplies credentials to live backends on first authenticated use.
 * The CLI may implement this with an interactive prompt.
 */
export type CredentialProvider = () => ExchangeCredentials | Promise<ExchangeCredentials>;
