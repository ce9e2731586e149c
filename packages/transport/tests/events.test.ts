import { describe, expect, it, vi } from 'vitest';
import { AsyncEventEmitter } from '../src/events.js';

type TestEvents = {
  data: (value: number) => void | Promise<void>;
};

describe('AsyncEventEmitter', () => {
  it('resolves once every listener has finished', async () => {
    const emitter = new AsyncEventEmitter<TestEvents>();
    const order: string[] = [];
    emitter.on('data', async (value) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push(`slow ${value}`);
    });
    emitter.on('data', (value) => {
      order.push(`fast ${value}`);
    });

    await emitter.emitAsync('data', 1);
    expect(order).toEqual(['fast 1', 'slow 1']);
  });

  it('calls listeners before it first yields', () => {
    const emitter = new AsyncEventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.on('data', listener);
    const settled = emitter.emitAsync('data', 2);
    expect(listener).toHaveBeenCalledWith(2);
    return settled;
  });

  it('rejects when a listener throws or rejects', async () => {
    const emitter = new AsyncEventEmitter<TestEvents>();
    emitter.on('data', () => {
      throw new Error('sync failure');
    });
    await expect(emitter.emitAsync('data', 3)).rejects.toThrow('sync failure');

    emitter.removeAllListeners();
    emitter.on('data', async () => {
      throw new Error('async failure');
    });
    await expect(emitter.emitAsync('data', 4)).rejects.toThrow('async failure');
  });

  it('resolves with no listeners', async () => {
    await expect(new AsyncEventEmitter<TestEvents>().emitAsync('data', 5)).resolves.toBeUndefined();
  });
});
