import { describe, it, expect } from 'vitest';
import { AmbiguousOutcomeError, ExchangeRejectedError } from '@tiered/errors';
import type { OrderAck, PlaceOrderSpec } from '@tiered/types';
import { GuardedExchange } from '../guarded-exchange.js';
import { PaperExchange } from '../paper-exchange.js';

const SYMBOL = 'DOGE/USDT';

const spec: PlaceOrderSpec = {
  clientOrderId: 'client-1',
  symbol: SYMBOL,
  side: 'BUY',
  kind: 'LIMIT',
  price: '1.50',
  amount: '10',
};

class SilentExchange extends PaperExchange {
  placeOrder(_spec: PlaceOrderSpec): Promise<OrderAck> {
    return new Promise<OrderAck>(() => undefined);
  }
}

function guarded(paper: PaperExchange, statusRetries = 0, timeoutMs = 1000): GuardedExchange {
  return new GuardedExchange(paper, { timeoutMs, statusRetries, retryDelayMs: 0 });
}

describe('GuardedExchange', () => {
  it('returns ok with the acknowledgement', async () => {
    const paper = new PaperExchange();

    const outcome = await guarded(paper).place(spec);

    expect(outcome).toMatchObject({ status: 'ok', value: { exchangeId: 'paper-1', clientOrderId: 'client-1' } });
    expect(paper.openOrders()).toHaveLength(1);
  });

  it('classifies an exchange rejection', async () => {
    const paper = new PaperExchange();
    paper.setMarketRules({ symbol: SYMBOL, priceDecimals: 2, amountDecimals: 0, minAmount: '100', minNotional: '0' });

    const outcome = await guarded(paper).place(spec);

    expect(outcome).toEqual({ status: 'rejected', reason: 'Order below market minimums' });
  });

  it('reports a transport failure as unknown without retrying', async () => {
    const paper = new PaperExchange();
    paper.injectFault('placeOrder', { error: new Error('socket hang up') });

    const outcome = await guarded(paper, 3).place(spec);

    expect(outcome).toMatchObject({ status: 'unknown', reason: 'socket hang up' });
    if (outcome.status !== 'unknown') throw new Error(`expected unknown, got ${outcome.status}`);
    expect(outcome.error).toBeInstanceOf(AmbiguousOutcomeError);
    expect(outcome.error.code).toBe('AMBIGUOUS_OUTCOME');
    expect(outcome.error.details).toEqual({ operation: 'placeOrder', cause: 'socket hang up' });
    expect(paper.openOrders()).toHaveLength(0);
  });

  it('reports a timed out placement as unknown', async () => {
    const outcome = await guarded(new SilentExchange(), 0, 20).place(spec);

    expect(outcome).toMatchObject({
      status: 'unknown',
      reason: 'placeOrder timed out after 20ms',
      error: { message: 'Outcome of placeOrder is unknown: placeOrder timed out after 20ms' },
    });
  });

  it('classifies a cancel of a finished order as rejected', async () => {
    const paper = new PaperExchange();
    paper.seedOrder('ex-1', spec);
    paper.fill('ex-1', '10');

    const outcome = await guarded(paper).cancel('ex-1', SYMBOL);

    expect(outcome).toEqual({ status: 'rejected', reason: 'Order ex-1 is FILLED' });
  });

  it('retries status reads up to the configured count', async () => {
    const paper = new PaperExchange();
    paper.seedOrder('ex-1', spec);
    paper.injectFault('fetchOrderStatus', { error: new Error('read timeout') });
    paper.injectFault('fetchOrderStatus', { error: new Error('read timeout') });

    const status = await guarded(paper, 2).fetchOrderStatus('ex-1', SYMBOL);

    expect(status).toMatchObject({ exchangeId: 'ex-1', state: 'OPEN', filledAmount: '0' });
  });

  it('gives up once retries are exhausted', async () => {
    const paper = new PaperExchange();
    paper.seedOrder('ex-1', spec);
    paper.injectFault('fetchOrderStatus', { error: new Error('read timeout') });
    paper.injectFault('fetchOrderStatus', { error: new Error('read timeout again') });

    await expect(guarded(paper, 1).fetchOrderStatus('ex-1', SYMBOL)).rejects.toThrow('read timeout again');
  });

  it('does not retry a rejected read', async () => {
    const paper = new PaperExchange();
    paper.injectFault('findOrderByClientId', { error: new ExchangeRejectedError('Unknown symbol') });

    await expect(guarded(paper, 3).findOrderByClientId('client-1', SYMBOL)).rejects.toBeInstanceOf(
      ExchangeRejectedError
    );
    expect(await guarded(paper).findOrderByClientId('client-1', SYMBOL)).toBeNull();
  });

  it('finds an order by client id after a lost response', async () => {
    const paper = new PaperExchange();
    paper.injectFault('placeOrder', { error: new Error('timeout'), afterApply: true });
    const exchange = guarded(paper);

    expect((await exchange.place(spec)).status).toBe('unknown');
    const found = await exchange.findOrderByClientId('client-1', SYMBOL);

    expect(found).toMatchObject({ exchangeId: 'paper-1', state: 'OPEN' });
  });
});
