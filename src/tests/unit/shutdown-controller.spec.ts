import { describe, expect, it } from 'vitest';

import { ShutdownController } from '../../shutdown-controller.js';
import { collectLogs } from '../fixtures/analysis-fixtures.js';

describe('ShutdownController', () => {
  it('aborts the signal with the reason and runs cleanups newest first', async () => {
    const controller = new ShutdownController();
    const order: string[] = [];
    controller.onShutdown('store', () => { order.push('store'); });
    controller.onShutdown('sink', async () => { await Promise.resolve(); order.push('sink'); });

    expect(controller.stopping).toBe(false);
    await controller.shutdown(undefined, 'Ctrl-C');
    expect(controller.signal.aborted).toBe(true);
    expect(controller.signal.reason).toEqual(new Error('Ctrl-C'));
    expect(controller.stopping).toBe(true);
    expect(order).toEqual(['sink', 'store']);
  });

  it('runs cleanups once across repeated calls', async () => {
    const controller = new ShutdownController();
    let runs = 0;
    controller.onShutdown('count', () => { runs += 1; });
    await Promise.all([controller.shutdown(), controller.shutdown()]);
    await controller.shutdown();
    expect(runs).toBe(1);
  });

  it('logs a failing cleanup and keeps going', async () => {
    const controller = new ShutdownController();
    const logs = collectLogs();
    let ran = false;
    controller.onShutdown('after', () => { ran = true; });
    controller.onShutdown('broken', () => { throw new Error('still busy'); });

    await controller.shutdown(logs.sink);
    expect(ran).toBe(true);
    expect(logs.entries.map((e) => [e.severity, e.message])).toEqual([['WRN', "cleanup 'broken' failed: still busy"]]);
  });

  it('skips removed cleanups', async () => {
    const controller = new ShutdownController();
    let ran = false;
    const remove = controller.onShutdown('gone', () => { ran = true; });
    remove();
    await controller.shutdown();
    expect(ran).toBe(false);
  });
});
