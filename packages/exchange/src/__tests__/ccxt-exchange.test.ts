import { describe, it, expect } from 'vitest';
import {
  AuthenticationError as CcxtAuthenticationError,
  BadSymbol as CcxtBadSymbol,
  DDoSProtection as CcxtDDoSProtection,
  ExchangeError as CcxtExchangeError,
  InsufficientFunds as CcxtInsufficientFunds,
  InvalidNonce as CcxtInvalidNonce,
  OrderNotFound as CcxtOrderNotFound,
  RateLimitExceeded as CcxtRateLimitExceeded,
  RequestTimeout as CcxtRequestTimeout,
} from 'ccxt';
import { AuthError, ExchangeError, NetworkError, NotFoundError, ValidationError } from '@tradegate/utils';
import { CcxtExchange, mapCcxtError } from '../ccxt-exchange';
import type { CcxtClient, CcxtExchangeOptions } from '../ccxt-exchange';
import { NOW, RAW_ORDER, createStubClient } from './stub-ccxt-client';

function createExchange(client: CcxtClient, overrides: Partial<CcxtExchangeOptions> = {}) {
  return new CcxtExchange({
    market: 'futures',
    sandbox: true,
    credentials: () => ({ apiKey: 'test-key', apiSecret: 'test-secret' }),
    retry: { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 1, jitterFactor: 0 },
    createClient: () => client,
    ...overrides,
  });
}

describe('CcxtExchange', () => {
  describe('construction', () => {
    it('enables sandbox mode on the client', () => {
      const client = createStubClient();

      createExchange(client);

      expect(client.setSandboxMode).toHaveBeenCalledWith(true);
    });

    it('refuses to fall back when the library has no sandbox for the market', () => {
      const client = createStubClient();
      client.setSandboxMode.mockImplementation(() => {
        throw new Error('testnet/sandbox mode is not supported');
      });

      let error: unknown;
      try {
        createExchange(client);
      } catch (caught) {
        error = caught;
      }

      expect(error).toBeInstanceOf(ExchangeError);
      expect(error).toMatchObject({
        code: 'SANDBOX_UNAVAILABLE',
        message: 'ccxt refused sandbox=true for futures: testnet/sandbox mode is not supported',
      });
    });
  });

  describe('orders', () => {
    it('converts symbols and sides for the library and back', async () => {
      const client = createStubClient();

      const order = await createExchange(client).createOrder({
        symbol: 'BTCUSDT',
        side: 'BUY',
        type: 'LIMIT',
        quantity: 0.01,
        price: 40000,
      });

      expect(client.createOrder).toHaveBeenCalledWith('BTC/USDT', 'limit', 'buy', 0.01, 40000);
      expect(order).toEqual({
        id: 1001,
        symbol: 'BTCUSDT',
        side: 'BUY',
        type: 'LIMIT',
        quantity: 0.01,
        price: 40000,
        status: 'OPEN',
        executedQuantity: 0,
        avgPrice: 0,
        createdAt: new Date(NOW),
        updatedAt: new Date(NOW),
      });
    });

    it('sends market orders without a price', async () => {
      const client = createStubClient();
      client.createOrder.mockResolvedValueOnce({
        ...RAW_ORDER,
        type: 'market',
        side: 'sell',
        price: 45010,
        filled: 0.01,
        average: 45010,
        status: 'closed',
      });

      const order = await createExchange(client).createOrder({
        symbol: 'BTCUSDT',
        side: 'SELL',
        type: 'MARKET',
        quantity: 0.01,
      });

      expect(client.createOrder).toHaveBeenCalledWith('BTC/USDT', 'market', 'sell', 0.01, undefined);
      expect(order).toMatchObject({ side: 'SELL', type: 'MARKET', status: 'FILLED', avgPrice: 45010 });
      expect(order).not.toHaveProperty('price');
    });

    it('reports a partially filled open order', async () => {
      const client = createStubClient();
      client.fetchOrder.mockResolvedValueOnce({ ...RAW_ORDER, filled: 0.004, average: 40000 });

      const order = await createExchange(client).fetchOrder('BTCUSDT', 1001);

      expect(client.fetchOrder).toHaveBeenCalledWith('1001', 'BTC/USDT');
      expect(order).toMatchObject({ status: 'PARTIALLY_FILLED', executedQuantity: 0.004, avgPrice: 40000 });
    });

    it('cancels by string id', async () => {
      const client = createStubClient();

      const order = await createExchange(client).cancelOrder('BTCUSDT', 1001);

      expect(client.cancelOrder).toHaveBeenCalledWith('1001', 'BTC/USDT');
      expect(order.status).toBe('CANCELED');
    });

    it('sorts open orders by id', async () => {
      const client = createStubClient();
      client.fetchOpenOrders.mockResolvedValueOnce([
        { ...RAW_ORDER, id: '30' },
        { ...RAW_ORDER, id: '10' },
        { ...RAW_ORDER, id: '20' },
      ]);

      const orders = await createExchange(client).fetchOpenOrders();

      expect(client.fetchOpenOrders).toHaveBeenCalledWith(undefined);
      expect(orders.map((order) => order.id)).toEqual([10, 20, 30]);
    });

    it('rejects order ids that are not integers', async () => {
      const client = createStubClient();
      client.fetchOrder.mockResolvedValueOnce({ ...RAW_ORDER, id: 'abc-1' });

      await expect(createExchange(client).fetchOrder('BTCUSDT', 1)).rejects.toMatchObject({
        kind: 'exchange',
        code: -1,
        message: "Non-integer order id 'abc-1'",
      });
    });
  });

  describe('credentials', () => {
    it('assigns resolved credentials before authenticated calls', async () => {
      const client = createStubClient();

      await createExchange(client).fetchBalance();

      expect(client.apiKey).toBe('test-key');
      expect(client.secret).toBe('test-secret');
    });

    it('fails authenticated calls without credentials before reaching the library', async () => {
      const client = createStubClient();

      await expect(createExchange(client, { credentials: undefined }).fetchBalance()).rejects.toBeInstanceOf(AuthError);
      expect(client.fetchBalance).not.toHaveBeenCalled();
    });

    it('serves market data without credentials', async () => {
      const client = createStubClient();

      const ticker = await createExchange(client, { credentials: undefined }).fetchTicker('ETHUSDT');

      expect(client.fetchTicker).toHaveBeenCalledWith('ETH/USDT');
      expect(ticker.symbol).toBe('ETHUSDT');
    });
  });

  describe('retry', () => {
    it('retries rate limiting and returns the eventual result', async () => {
      const client = createStubClient();
      client.fetchOrder.mockRejectedValueOnce(new CcxtRateLimitExceeded('binance 429 Too Many Requests'));

      const order = await createExchange(client).fetchOrder('BTCUSDT', 1001);

      expect(order.id).toBe(1001);
      expect(client.fetchOrder).toHaveBeenCalledTimes(2);
    });

    it('surfaces a network error once attempts run out', async () => {
      const client = createStubClient();
      client.fetchBalance.mockRejectedValue(new CcxtRequestTimeout('binance GET https://example.invalid timed out'));

      await expect(createExchange(client).fetchBalance()).rejects.toBeInstanceOf(NetworkError);
      expect(client.fetchBalance).toHaveBeenCalledTimes(3);
    });

    it('does not retry business rejections', async () => {
      const client = createStubClient();
      client.createOrder.mockRejectedValueOnce(
        new CcxtInsufficientFunds('binance {"code":-2019,"msg":"Margin is insufficient."}')
      );

      const error = await createExchange(client)
        .createOrder({ symbol: 'BTCUSDT', side: 'BUY', type: 'MARKET', quantity: 100 })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ExchangeError);
      expect(error).toMatchObject({ code: -2019, message: 'Margin is insufficient.' });
      expect(client.createOrder).toHaveBeenCalledTimes(1);
    });
  });

  describe('market data', () => {
    it('fills a missing top of book from the order book', async () => {
      const client = createStubClient();
      client.fetchTicker.mockResolvedValueOnce({ bid: null, ask: null, last: 45000, close: 45000, timestamp: NOW });

      const ticker = await createExchange(client).fetchTicker('BTCUSDT');

      expect(client.fetchOrderBook).toHaveBeenCalledWith('BTC/USDT', 5);
      expect(ticker).toEqual({ symbol: 'BTCUSDT', bid: 44999, ask: 45001, last: 45000, timestamp: new Date(NOW) });
    });

    it('falls back to the close when there is no last price', async () => {
      const client = createStubClient();
      client.fetchTicker.mockResolvedValueOnce({ bid: 43990, ask: 44010, last: null, close: 44000, timestamp: NOW });

      const ticker = await createExchange(client).fetchTicker('BTCUSDT');

      expect(ticker.last).toBe(44000);
      expect(client.fetchOrderBook).not.toHaveBeenCalled();
    });

    it('keeps only assets with a balance', async () => {
      const client = createStubClient();
      client.fetchBalance.mockResolvedValueOnce({
        info: {},
        free: { USDT: 900, BTC: 0, ETH: null },
        used: { USDT: 100 },
        total: { USDT: 1000, BTC: 0 },
      });

      await expect(createExchange(client).fetchBalance()).resolves.toEqual({
        USDT: { free: 900, used: 100, total: 1000 },
      });
    });

    it('reads candles', async () => {
      const client = createStubClient();
      client.fetchOHLCV.mockResolvedValueOnce([[NOW, 1, 2, 0.5, 1.5, 100]]);

      const candles = await createExchange(client).fetchOhlcv('BTCUSDT', '1h', 50);

      expect(client.fetchOHLCV).toHaveBeenCalledWith('BTC/USDT', '1h', undefined, 50);
      expect(candles).toEqual([{ timestamp: NOW, open: 1, high: 2, low: 0.5, close: 1.5, volume: 100 }]);
    });
  });

  describe('testConnection', () => {
    it('returns false when the balance call fails', async () => {
      const client = createStubClient();
      client.fetchBalance.mockRejectedValueOnce(new CcxtAuthenticationError('binance {"code":-2015,"msg":"Invalid API-key"}'));

      await expect(createExchange(client).testConnection()).resolves.toBe(false);
    });
  });
});

describe('mapCcxtError', () => {
  it('honors an embedded auth code', () => {
    const error = mapCcxtError(
      new CcxtAuthenticationError('binance {"code":-2015,"msg":"Invalid API-key, IP, or permissions for action."}')
    );

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ code: -2015, message: 'Invalid API-key, IP, or permissions for action.' });
  });

  it('treats clock skew as an auth failure', () => {
    expect(mapCcxtError(new CcxtInvalidNonce('binance {"code":-1021,"msg":"Timestamp outside recvWindow"}'))).toMatchObject({
      kind: 'auth',
      code: -1021,
    });
    expect(mapCcxtError(new CcxtInvalidNonce('nonce too small'))).toBeInstanceOf(AuthError);
  });

  it('maps unknown orders with the requested id', () => {
    const error = mapCcxtError(new CcxtOrderNotFound('binance {"code":-2013,"msg":"Order does not exist."}'), {
      symbol: 'BTCUSDT',
      orderId: 77,
    });

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ resource: 'order', id: '77', code: -2013, message: 'Order does not exist.' });
  });

  it('maps bad symbols to the symbol', () => {
    const error = mapCcxtError(new CcxtBadSymbol('binance does not have market symbol FOO/USDT'), {
      symbol: 'FOOUSDT',
    });

    expect(error).toMatchObject({ kind: 'not_found', resource: 'symbol', id: 'FOOUSDT' });
  });

  it('tags throttling with its class name', () => {
    expect(mapCcxtError(new CcxtRateLimitExceeded('slow down'))).toMatchObject({
      kind: 'exchange',
      code: 'RateLimitExceeded',
    });
    expect(mapCcxtError(new CcxtDDoSProtection('blocked'))).toMatchObject({ kind: 'exchange', code: 'DDoSProtection' });
  });

  it('keeps exchange codes on business errors', () => {
    expect(
      mapCcxtError(new CcxtExchangeError('binance {"code":-4164,"msg":"Notional must be no smaller than 100"}'))
    ).toMatchObject({ kind: 'exchange', code: -4164, message: 'Notional must be no smaller than 100' });
    expect(mapCcxtError(new CcxtInsufficientFunds('insufficient'))).toMatchObject({
      kind: 'exchange',
      code: 'InsufficientFunds',
    });
  });

  it('passes taxonomy errors through and wraps anything else', () => {
    const validation = new ValidationError('quantity', 'must be positive');

    expect(mapCcxtError(validation)).toBe(validation);
    expect(mapCcxtError(new Error('boom'))).toMatchObject({ kind: 'exchange', code: 'UNKNOWN', message: 'boom' });
    expect(mapCcxtError('boom')).toMatchObject({ kind: 'exchange', code: 'UNKNOWN', message: 'boom' });
  });
});
