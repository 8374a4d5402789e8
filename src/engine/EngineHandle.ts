/**
 * Engine Handle
 * Owns the single engine connection for the life of the process and hands out
 * one isolated context per request.
 */
import { AcquisitionError, StartupError, errorMessage } from '../errors';
import { createLogger } from '../utils/logger';
import { withDeadline } from '../utils/deadline';
import { EngineConnection, EngineDriver, RenderContext } from './types';

const log = createLogger('ENGINE');

/** Default upper bound for closing a context or the engine; a dead engine may never answer */
export const DEFAULT_CLOSE_TIMEOUT_MS = 5000;

/** How long a render waits for its context to close before returning */
export const RELEASE_WAIT_MS = 250;

export type EngineState = 'idle' | 'running' | 'disconnected' | 'stopped';

export interface EngineHandleOptions {
  startupTimeoutMs: number;
  /** Bound for each context or connection close */
  closeTimeoutMs?: number;
}

/**
 * A checked-out context. `release()` closes it exactly once, however often it is called.
 */
export class ContextLease {
  private releasing: Promise<void> | null = null;

  constructor(
    readonly context: RenderContext,
    private readonly closeContext: (lease: ContextLease) => Promise<void>
  ) {}

  get released(): boolean {
    return this.releasing !== null;
  }

  release(): Promise<void> {
    if (!this.releasing) {
      this.releasing = this.closeContext(this);
    }
    return this.releasing;
  }

  /**
   * Start the release and wait for it at most `waitMs`; the close carries on in the background.
   * Resolves true when the context finished closing in time.
   */
  async releaseWithin(waitMs: number): Promise<boolean> {
    const releasing = this.release();
    try {
      await withDeadline(releasing, {
        timeoutMs: waitMs,
        onTimeout: () => new Error(`Context release still running after ${waitMs}ms`),
      });
      return true;
    } catch (error) {
      log.debug(errorMessage(error), { contextId: this.context.id });
      return false;
    }
  }
}

/**
 * Close whatever a timed-out operation eventually produces
 */
function discardLateArrival<T>(pending: Promise<T>, close: (value: T) => Promise<void>, what: string): void {
  pending.then(close).catch((error: unknown) => {
    log.debug(`Late ${what} settled with an error`, { error: errorMessage(error) });
  });
}

export class EngineHandle {
  private connection: EngineConnection | null = null;
  private state: EngineState = 'idle';
  private reconnecting: Promise<void> | null = null;
  /** Connected, but the last checkout got no context in time */
  private wedged = false;
  private stopping: Promise<void> | null = null;
  private readonly leases = new Set<ContextLease>();
  private drainWaiters: Array<() => void> = [];

  private readonly closeTimeoutMs: number;

  constructor(
    private readonly driver: EngineDriver,
    private readonly options: EngineHandleOptions
  ) {
    this.closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
  }

  get liveContexts(): number {
    return this.leases.size;
  }

  getState(): EngineState {
    return this.state;
  }

  isWedged(): boolean {
    return this.wedged;
  }

  isStopped(): boolean {
    return this.state === 'stopped';
  }

  isConnected(): boolean {
    return this.state === 'running' && this.connection !== null && this.connection.isConnected();
  }

  /**
   * Launch the engine. Fails with StartupError if it is not up within the startup window.
   */
  async start(): Promise<void> {
    if (this.state === 'stopped') {
      throw new StartupError('Engine handle has already been stopped');
    }
    if (this.isConnected()) {
      log.warn('Engine already started');
      return;
    }

    log.info(`Starting ${this.driver.name} engine...`);
    await this.connect();
    log.info('Engine started');
  }

  private async connect(): Promise<void> {
    const { startupTimeoutMs } = this.options;
    let timedOut = false;
    const launching = this.driver.launch();

    let connection: EngineConnection;
    try {
      connection = await withDeadline(launching, {
        timeoutMs: startupTimeoutMs,
        onTimeout: () => {
          timedOut = true;
          return new StartupError(`Engine did not start within ${startupTimeoutMs}ms`);
        },
      });
    } catch (error) {
      if (timedOut) {
        discardLateArrival(launching, late => late.close(), 'engine launch');
      }
      if (error instanceof StartupError) throw error;
      throw new StartupError(`Engine launch failed: ${errorMessage(error)}`, { cause: error });
    }

    if (this.isStopped()) {
      await connection.close();
      throw new StartupError('Engine handle was stopped during launch');
    }

    connection.onDisconnect(() => {
      if (this.connection === connection) {
        this.markDisconnected('engine connection lost');
      }
    });
    this.connection = connection;
    this.wedged = false;
    this.state = 'running';
  }

  private markDisconnected(reason: string): void {
    if (this.state === 'running') {
      log.warn(`Engine marked for reconnect: ${reason}`);
      this.state = 'disconnected';
    }
  }

  /**
   * Create a fresh isolated context. Throws AcquisitionError when the engine is unavailable
   * or the context is not created within `timeoutMs`.
   */
  async checkoutContext(timeoutMs: number): Promise<ContextLease> {
    if (this.state === 'stopped') {
      throw new AcquisitionError('Engine is shutting down');
    }

    const connection = this.connection;
    if (!connection || !connection.isConnected()) {
      this.markDisconnected('connection is not alive');
      throw new AcquisitionError('Engine is not connected');
    }
    if (this.state !== 'running') {
      throw new AcquisitionError('Engine is awaiting reconnect');
    }

    let timedOut = false;
    const creating = connection.createContext();

    let context: RenderContext;
    try {
      context = await withDeadline(creating, {
        timeoutMs,
        onTimeout: () => {
          timedOut = true;
          return new AcquisitionError(`No context was created within ${timeoutMs}ms`);
        },
      });
    } catch (error) {
      if (timedOut) {
        discardLateArrival(creating, late => late.close(), 'context');
        // relaunched by the next reconnect() once no other render is using it
        if (connection.isConnected()) {
          log.warn('Engine is connected but did not create a context in time');
          this.wedged = true;
        } else {
          this.markDisconnected('connection lost during context creation');
        }
      } else if (!connection.isConnected()) {
        this.markDisconnected('connection lost during context creation');
      }
      if (error instanceof AcquisitionError) throw error;
      throw new AcquisitionError(`Context creation failed: ${errorMessage(error)}`, { cause: error });
    }

    this.wedged = false;
    const lease = new ContextLease(context, released => this.releaseLease(released));
    this.leases.add(lease);
    log.debug(`Context ${context.id} checked out`, { liveContexts: this.leases.size });

    if (this.isStopped()) {
      await lease.release();
      throw new AcquisitionError('Engine is shutting down');
    }
    return lease;
  }

  private async releaseLease(lease: ContextLease): Promise<void> {
    const { id } = lease.context;
    try {
      await withDeadline(lease.context.close(), {
        timeoutMs: this.closeTimeoutMs,
        onTimeout: () => new Error(`Timed out after ${this.closeTimeoutMs}ms`),
      });
    } catch (error) {
      log.warn(`Closing context ${id} failed: ${errorMessage(error)}`);
    } finally {
      this.leases.delete(lease);
      log.debug(`Context ${id} released`, { liveContexts: this.leases.size });
      if (this.leases.size === 0) {
        const waiters = this.drainWaiters;
        this.drainWaiters = [];
        waiters.forEach(notify => notify());
      }
    }
  }

  /**
   * Replace a dead connection with a new one. Concurrent callers share a single attempt.
   * A wedged but connected engine is only replaced once no context is live, so renders
   * still running on it are not torn down.
   */
  reconnect(): Promise<void> {
    if (this.state === 'stopped') {
      return Promise.reject(new AcquisitionError('Engine is shutting down'));
    }
    if (this.isConnected() && !this.wedged) {
      return Promise.resolve();
    }
    if (this.isConnected() && this.leases.size > 0) {
      log.warn(`Engine looks wedged; relaunch deferred while ${this.leases.size} context(s) are live`);
      return Promise.resolve();
    }
    if (!this.reconnecting) {
      this.reconnecting = this.relaunch().finally(() => {
        this.reconnecting = null;
      });
    }
    return this.reconnecting;
  }

  private async relaunch(): Promise<void> {
    log.warn('Reconnecting engine...');
    const previous = this.connection;
    this.connection = null;
    this.state = 'disconnected';
    if (previous) {
      await this.closeConnection(previous);
    }

    try {
      await this.connect();
    } catch (error) {
      throw new AcquisitionError(`Engine reconnect failed: ${errorMessage(error)}`, { cause: error });
    }
    log.info('Engine reconnected');
  }

  private async closeConnection(connection: EngineConnection): Promise<void> {
    try {
      await withDeadline(connection.close(), {
        timeoutMs: this.closeTimeoutMs,
        onTimeout: () => new Error(`Timed out after ${this.closeTimeoutMs}ms`),
      });
    } catch (error) {
      log.warn(`Closing engine connection failed: ${errorMessage(error)}`);
    }
  }

  private waitForDrain(timeoutMs: number): Promise<void> {
    if (this.leases.size === 0) {
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      const timer = setTimeout(done, timeoutMs);
      function done(): void {
        clearTimeout(timer);
        resolve();
      }
      this.drainWaiters.push(done);
    });
  }

  /**
   * Refuse new checkouts, give live contexts up to `graceMs` to be released, then close the engine.
   * Safe to call more than once.
   */
  stop(graceMs = 0): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown(graceMs);
    }
    return this.stopping;
  }

  private async shutdown(graceMs: number): Promise<void> {
    log.info('Stopping engine...');
    this.state = 'stopped';

    if (this.leases.size > 0 && graceMs > 0) {
      log.info(`Waiting up to ${graceMs}ms for ${this.leases.size} context(s) to finish`);
      await this.waitForDrain(graceMs);
    }
    if (this.leases.size > 0) {
      log.warn(`Force-closing ${this.leases.size} context(s)`);
      await Promise.all([...this.leases].map(lease => lease.release()));
    }

    if (this.reconnecting) {
      await this.reconnecting.catch((error: unknown) => {
        log.debug('Reconnect interrupted by shutdown', { error: errorMessage(error) });
      });
    }

    const connection = this.connection;
    this.connection = null;
    if (connection) {
      await this.closeConnection(connection);
    }
    log.info('Engine stopped');
  }
}
