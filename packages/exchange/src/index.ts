export { OrderManager, createBackend } from './order-manager';
export type { OrderManagerDeps } from './order-manager';

export { createCredentialResolver } from './backend';
export type { ExchangeBackend } from './backend';

export { MockExchange } from './mock-exchange';
export type { MockExchangeOptions } from './mock-exchange';
export { Ledger } from './ledger';
export { PriceModel } from './price-model';
export type { PriceModelConfig } from './price-model';

export { HttpTransport } from './transport';
export type { HttpMethod, HttpTransportOptions, SendOptions } from './transport';

export { RestExchange, ENDPOINTS } from './rest-exchange';
export type { RestExchangeOptions } from './rest-exchange';

export { CcxtExchange, createCcxtClient, mapCcxtError } from './ccxt-exchange';
export type { CcxtClient, CcxtExchangeOptions } from './ccxt-exchange';
