import { loadConfig } from './config';
import { Supervisor } from './lifecycle/supervisor';
import { createResourceStore } from './storage';

/**
 * Main entrypoint for the gateway.
 * Exit codes: 0 after a signal-driven shutdown, 1 when startup fails
 * (bad configuration, bind failure, identity never published).
 */
async function main() {
  const config = loadConfig();
  const supervisor = new Supervisor({ config, store: createResourceStore(config) });

  const shutdown = (signal: NodeJS.Signals) => {
    supervisor.stop().then(
      () => process.exit(0),
      (err) => {
        console.error(`Shutdown after ${signal} failed:`, err);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await supervisor.start();
}

// run
main().catch((err) => {
  // last-resort catch; startup errors are already logged by the supervisor
  console.error('Fatal error starting gateway:', err);
  process.exit(1);
});
