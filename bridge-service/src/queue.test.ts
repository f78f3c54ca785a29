import { describe, expect, it } from 'vitest';
import { AsyncQueue } from './queue.js';
import { sleep } from './sleep.js';

describe('AsyncQueue', () => {
  it('hands out items in insertion order', async () => {
    const queue = new AsyncQueue<number>();
    queue.put(1);
    queue.put(2);
    expect(queue.size).toBe(2);
    expect(await queue.get()).toBe(1);
    expect(await queue.get()).toBe(2);
    expect(queue.size).toBe(0);
  });

  it('serves waiting getters in the order they asked', async () => {
    const queue = new AsyncQueue<string>();
    const first = queue.get();
    const second = queue.get();
    queue.put('a');
    queue.put('b');
    expect(await first).toBe('a');
    expect(await second).toBe('b');
  });

  it('rejects a waiting get when its signal aborts and keeps later items', async () => {
    const queue = new AsyncQueue<string>();
    const controller = new AbortController();
    const pending = queue.get(controller.signal);
    controller.abort(new Error('cancelled'));
    await expect(pending).rejects.toThrow('cancelled');
    queue.put('x');
    expect(queue.size).toBe(1);
    expect(await queue.get()).toBe('x');
  });

  it('drains buffered items after fail() and then rejects', async () => {
    const queue = new AsyncQueue<number>();
    queue.put(7);
    queue.fail(new Error('gone'));
    queue.put(8);
    expect(await queue.get()).toBe(7);
    await expect(queue.get()).rejects.toThrow('gone');
  });

  it('rejects getters already waiting when fail() is called', async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.get();
    queue.fail(new Error('gone'));
    await expect(pending).rejects.toThrow('gone');
  });
});

describe('sleep', () => {
  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort(new Error('stop'));
    await expect(pending).rejects.toThrow('stop');
  });

  it('rejects immediately on an already aborted signal', async () => {
    await expect(sleep(10, AbortSignal.abort(new Error('early')))).rejects.toThrow('early');
  });
});
