import type { GatewayConfig } from '../config';
import type { ResourceStore } from '../contracts/resourceStore';
import { buildApp, type GatewayApp } from '../server';
import { sleep, waitForIdentity } from './identity';
import { initialState, type GatewayState } from './state';

export interface SupervisorDeps {
  config: GatewayConfig;
  store: ResourceStore;
  /** Delay used between identity polls; replaced in tests. */
  wait?: (ms: number) => Promise<void>;
}

export interface StartedGateway {
  /** Address the listener is bound to, e.g. http://127.0.0.1:8080 */
  listening: string;
  /** Public onion address, e.g. http://<identity>.onion/ */
  publicAddress: string;
}

/**
 * Owns startup and shutdown of the gateway process.
 *
 * start: bind listener -> wait for the hidden-service identity -> merge it
 * into the allowlist -> ready. Until then only the configured loopback
 * alias and extra hosts are admitted.
 * stop: refuse new connections, drain in-flight requests for up to
 * `shutdownGraceMs`, force-close the rest, release the store.
 */
export class Supervisor {
  readonly state: GatewayState;
  private readonly config: GatewayConfig;
  private readonly store: ResourceStore;
  private readonly wait: (ms: number) => Promise<void>;
  private app: GatewayApp | null = null;
  private stopping: Promise<void> | null = null;

  constructor(deps: SupervisorDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.wait = deps.wait ?? sleep;
    this.state = initialState([deps.config.loopbackAlias, ...deps.config.allowedHosts]);
  }

  async start(): Promise<StartedGateway> {
    if (this.app) throw new Error('gateway already started');

    const { config } = this;
    const app = await buildApp({
      store: this.store,
      state: this.state,
      logLevel: config.logLevel,
      maxConnections: config.maxConnections,
    });
    this.app = app;

    let listening: string;
    let identity: string;
    try {
      listening = await app.listen({ host: config.host, port: config.port });
      app.log.info({ listening, identityFile: config.identityFile }, 'Listener bound, waiting for hidden-service identity');
      identity = await waitForIdentity(config.identityFile, config.identity, app.log, this.wait);
    } catch (err) {
      app.log.error({ err }, 'Gateway startup failed');
      await this.stop();
      throw err;
    }

    // the only mutation of the allowlist; readers never see a partial guard
    this.state.guard = this.state.guard.merge([identity]);
    this.state.publicAddress = `http://${identity}/`;
    this.state.phase = 'ready';

    app.log.info(
      { publicAddress: this.state.publicAddress, allowlist: this.state.guard.entries() },
      'Gateway ready',
    );
    return { listening, publicAddress: this.state.publicAddress };
  }

  /** Idempotent; concurrent callers share one shutdown. */
  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.state.phase = 'draining';
    const app = this.app;

    if (app) {
      const drained = app.close().then(() => true as const);
      let timer: NodeJS.Timeout | undefined;
      const graceElapsed = new Promise<false>((resolve) => {
        timer = setTimeout(() => resolve(false), this.config.shutdownGraceMs);
      });

      const inTime = await Promise.race([drained, graceElapsed]);
      clearTimeout(timer);
      if (!inTime) {
        app.log.warn({ graceMs: this.config.shutdownGraceMs }, 'Grace period elapsed, closing remaining connections');
        app.server.closeAllConnections();
        await drained;
      }
    }

    await this.store.close();
    this.state.phase = 'stopped';
    app?.log.info('Gateway stopped');
  }
}
