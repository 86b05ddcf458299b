import { describe, it, expect } from 'vitest';
import { AsyncEventQueue } from '../src/async-event-queue.js';

describe('AsyncEventQueue', () => {
  it('delivers buffered items in push order', async () => {
    const queue = new AsyncEventQueue<string>();
    queue.push('Analyzing...');
    queue.push('Scoring...');
    expect(queue.pending).toBe(2);
    queue.complete();

    const items: string[] = [];
    for await (const item of queue) {
      items.push(item);
    }
    expect(items).toEqual(['Analyzing...', 'Scoring...']);
    expect(queue.pending).toBe(0);
  });

  it('hands an item straight to a waiting consumer', async () => {
    const queue = new AsyncEventQueue<number>();
    const iter = queue[Symbol.asyncIterator]();

    const next = iter.next();
    expect(queue.push(7)).toBe(true);

    expect(await next).toEqual({ value: 7, done: false });
    expect(queue.pending).toBe(0);
  });

  it('ends a waiting consumer on complete', async () => {
    const queue = new AsyncEventQueue<number>();
    const iter = queue[Symbol.asyncIterator]();

    const next = iter.next();
    queue.complete();

    expect(await next).toEqual({ value: undefined, done: true });
    expect(queue.isClosed).toBe(true);
  });

  it('refuses pushes once closed', () => {
    const queue = new AsyncEventQueue<number>();
    queue.complete();
    expect(queue.push(1)).toBe(false);
    expect(queue.pending).toBe(0);
  });

  it('drains the buffer before surfacing an error', async () => {
    const queue = new AsyncEventQueue<number>();
    queue.push(1);
    queue.error(new Error('handler crashed'));

    const iter = queue[Symbol.asyncIterator]();
    expect(await iter.next()).toEqual({ value: 1, done: false });
    await expect(iter.next()).rejects.toThrow('handler crashed');
    expect(await iter.next()).toEqual({ value: undefined, done: true });
  });

  it('rejects a waiting consumer on error', async () => {
    const queue = new AsyncEventQueue<number>();
    const iter = queue[Symbol.asyncIterator]();

    const next = iter.next();
    queue.error(new Error('stream torn down'));

    await expect(next).rejects.toThrow('stream torn down');
  });

  it('drops buffered items when the consumer returns early', async () => {
    const queue = new AsyncEventQueue<number>();
    queue.push(1);
    queue.push(2);

    const iter = queue[Symbol.asyncIterator]();
    expect(await iter.next()).toEqual({ value: 1, done: false });

    const returned = await iter.return?.();
    expect(returned).toEqual({ value: undefined, done: true });
    expect(queue.isClosed).toBe(true);
    expect(queue.pending).toBe(0);
    expect(queue.push(3)).toBe(false);
    expect(await iter.next()).toEqual({ value: undefined, done: true });
  });

  it('interleaves producer and consumer', async () => {
    const queue = new AsyncEventQueue<number>();
    const collected: number[] = [];

    const consumer = (async () => {
      for await (const item of queue) {
        collected.push(item);
      }
    })();

    queue.push(10);
    await new Promise((r) => setTimeout(r, 5));
    queue.push(20);
    queue.complete();

    await consumer;
    expect(collected).toEqual([10, 20]);
  });
});
