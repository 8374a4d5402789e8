/**
 * Unit tests for EngineHandle
 * Covers startup, context checkout/release, reconnect and shutdown against a fake engine
 */

import { AcquisitionError, StartupError } from '../src/errors';
import { EngineHandle } from '../src/engine/EngineHandle';
import { setLogLevel } from '../src/utils/logger';
import { FakeDriver } from './helpers/fakeEngine';

function flushPromises(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('EngineHandle', () => {
  let driver: FakeDriver;
  let engine: EngineHandle;

  beforeAll(() => {
    setLogLevel('error');
  });

  afterAll(() => {
    setLogLevel('info');
  });

  beforeEach(() => {
    driver = new FakeDriver();
    engine = new EngineHandle(driver, { startupTimeoutMs: 100 });
  });

  describe('start', () => {
    test('should launch the engine once', async () => {
      await engine.start();
      await engine.start();

      expect(driver.launches).toBe(1);
      expect(engine.isConnected()).toBe(true);
      expect(engine.getState()).toBe('running');
    });

    test('should fail with StartupError when the launch fails', async () => {
      driver.launchBehavior = 'fail';

      await expect(engine.start()).rejects.toThrow(StartupError);
      await expect(engine.start()).rejects.toThrow('Engine launch failed: Failed to launch the browser process');
      expect(engine.isConnected()).toBe(false);
    });

    test('should fail when the engine does not come up within the startup window', async () => {
      driver.launchBehavior = 'hang';

      await expect(engine.start()).rejects.toThrow('Engine did not start within 100ms');
      expect(engine.isConnected()).toBe(false);
    });

    test('should close an engine that finishes launching after the startup window', async () => {
      driver.launchBehavior = 'hang';
      await expect(engine.start()).rejects.toThrow(StartupError);

      driver.flushPendingLaunches();
      await flushPromises();

      expect(driver.current?.closeCount).toBe(1);
    });
  });

  describe('checkoutContext', () => {
    beforeEach(async () => {
      await engine.start();
    });

    test('should hand out a fresh context per checkout', async () => {
      const first = await engine.checkoutContext(1000);
      const second = await engine.checkoutContext(1000);

      expect(first.context.id).not.toBe(second.context.id);
      expect(engine.liveContexts).toBe(2);

      await first.release();
      await second.release();
      expect(engine.liveContexts).toBe(0);
    });

    test('should close the context exactly once however often it is released', async () => {
      const lease = await engine.checkoutContext(1000);

      await Promise.all([lease.release(), lease.release()]);
      await lease.release();

      expect(lease.released).toBe(true);
      expect(driver.allContexts[0].closeCount).toBe(1);
      expect(engine.liveContexts).toBe(0);
    });

    test('should give concurrent checkouts independent contexts', async () => {
      const leases = await Promise.all(Array.from({ length: 5 }, () => engine.checkoutContext(1000)));

      expect(new Set(leases.map(lease => lease.context.id)).size).toBe(5);
      expect(engine.liveContexts).toBe(5);

      await Promise.all(leases.map(lease => lease.release()));
      expect(engine.liveContexts).toBe(0);
    });

    test('should fail with AcquisitionError when context creation times out', async () => {
      driver.createBehavior = 'hang';

      await expect(engine.checkoutContext(20)).rejects.toThrow(new AcquisitionError('No context was created within 20ms'));
      expect(engine.liveContexts).toBe(0);
      expect(engine.getState()).toBe('running');
      expect(engine.isWedged()).toBe(true);
    });


    test('should close a context that arrives after its checkout timed out', async () => {
      driver.createBehavior = 'hang';
      await expect(engine.checkoutContext(20)).rejects.toThrow(AcquisitionError);

      driver.current?.flushPendingCreates();
      await flushPromises();

      expect(driver.allContexts).toHaveLength(1);
      expect(driver.allContexts[0].closeCount).toBe(1);
      expect(engine.liveContexts).toBe(0);
    });

    test('should wrap context creation failures', async () => {
      driver.createBehavior = 'fail';

      await expect(engine.checkoutContext(1000)).rejects.toThrow(
        new AcquisitionError('Context creation failed: Target.createBrowserContext failed')
      );
    });

    test('should refuse checkouts once the connection is lost', async () => {
      driver.current?.sever();

      expect(engine.isConnected()).toBe(false);
      expect(engine.getState()).toBe('disconnected');
      await expect(engine.checkoutContext(1000)).rejects.toThrow(new AcquisitionError('Engine is not connected'));
    });

    test('should still release a context whose engine died', async () => {
      const lease = await engine.checkoutContext(1000);
      driver.current?.sever();

      await lease.release();

      expect(engine.liveContexts).toBe(0);
      expect(driver.allContexts[0].closeCount).toBe(1);
    });
  });

  test('should refuse checkouts before start', async () => {
    await expect(engine.checkoutContext(1000)).rejects.toThrow(new AcquisitionError('Engine is not connected'));
  });

  describe('reconnect', () => {
    beforeEach(async () => {
      await engine.start();
    });

    test('should replace a dead connection', async () => {
      const original = driver.current;
      original?.sever();

      await engine.reconnect();

      expect(driver.launches).toBe(2);
      expect(original?.closeCount).toBe(1);
      expect(engine.isConnected()).toBe(true);

      const lease = await engine.checkoutContext(1000);
      expect(lease.context).toBe(driver.current?.contexts[0]);
      await lease.release();
    });

    test('should share one attempt between concurrent callers', async () => {
      driver.current?.sever();

      await Promise.all([engine.reconnect(), engine.reconnect(), engine.reconnect()]);

      expect(driver.launches).toBe(2);
    });

    test('should relaunch a wedged engine once no context is live', async () => {
      const original = driver.current;
      driver.createBehavior = 'hang';
      await expect(engine.checkoutContext(20)).rejects.toThrow(AcquisitionError);
      driver.createBehavior = 'ok';

      await engine.reconnect();

      expect(driver.launches).toBe(2);
      expect(original?.closeCount).toBe(1);
      expect(engine.isWedged()).toBe(false);
    });

    test('should keep a wedged engine while other contexts are still rendering', async () => {
      const original = driver.current;
      const busy = await engine.checkoutContext(1000);
      driver.createBehavior = 'hang';
      await expect(engine.checkoutContext(20)).rejects.toThrow(AcquisitionError);

      await engine.reconnect();

      expect(driver.launches).toBe(1);
      expect(original?.closeCount).toBe(0);
      expect(engine.isConnected()).toBe(true);
      await busy.release();
      expect(driver.allContexts[0].closeCount).toBe(1);
    });

    test('should not relaunch a healthy engine', async () => {
      await engine.reconnect();

      expect(driver.launches).toBe(1);
    });

    test('should fail with AcquisitionError when the relaunch fails', async () => {
      driver.current?.sever();
      driver.launchBehavior = 'fail';

      await expect(engine.reconnect()).rejects.toThrow(AcquisitionError);
      await expect(engine.reconnect()).rejects.toThrow(
        'Engine reconnect failed: Engine launch failed: Failed to launch the browser process'
      );
    });
  });

  describe('unresponsive connection close', () => {
    beforeEach(async () => {
      engine = new EngineHandle(driver, { startupTimeoutMs: 100, closeTimeoutMs: 20 });
      await engine.start();
    });

    test('should relaunch even when the dead connection never finishes closing', async () => {
      const original = driver.current;
      if (original) original.closeHangs = true;
      original?.sever();

      await engine.reconnect();

      expect(driver.launches).toBe(2);
      expect(original?.closeCount).toBe(1);
      expect(engine.isConnected()).toBe(true);
    });

    test('should finish stopping when the connection never finishes closing', async () => {
      const original = driver.current;
      if (original) original.closeHangs = true;

      await engine.stop();

      expect(engine.getState()).toBe('stopped');
      expect(original?.closeCount).toBe(1);
    });

    test('should stop waiting for a context close that never finishes', async () => {
      const lease = await engine.checkoutContext(1000);
      driver.contextCloseHangs = true;

      await expect(lease.releaseWithin(5)).resolves.toBe(false);
      expect(lease.released).toBe(true);
      expect(engine.liveContexts).toBe(1);

      // the close timeout still frees the slot
      await lease.release();
      expect(engine.liveContexts).toBe(0);
    });
  });

  describe('stop', () => {
    beforeEach(async () => {
      await engine.start();
    });

    test('should be idempotent', async () => {
      await Promise.all([engine.stop(), engine.stop()]);
      await engine.stop();

      expect(driver.current?.closeCount).toBe(1);
      expect(engine.getState()).toBe('stopped');
    });

    test('should refuse checkouts, reconnects and restarts afterwards', async () => {
      await engine.stop();

      await expect(engine.checkoutContext(1000)).rejects.toThrow(new AcquisitionError('Engine is shutting down'));
      await expect(engine.reconnect()).rejects.toThrow(AcquisitionError);
      await expect(engine.start()).rejects.toThrow(StartupError);
    });

    test('should wait for live contexts within the grace period', async () => {
      const lease = await engine.checkoutContext(1000);

      const stopping = engine.stop(1000);
      await flushPromises();
      expect(driver.current?.closeCount).toBe(0);

      await lease.release();
      await stopping;

      expect(driver.current?.closeCount).toBe(1);
      expect(driver.allContexts[0].closeCount).toBe(1);
    });

    test('should force-close contexts still live after the grace period', async () => {
      await engine.checkoutContext(1000);

      await engine.stop(20);

      expect(engine.liveContexts).toBe(0);
      expect(driver.allContexts[0].closeCount).toBe(1);
      expect(driver.current?.closeCount).toBe(1);
    });
  });
});
