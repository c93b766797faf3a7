import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig, requireCredentials } from './config.js';
import { errorMessage } from './errors.js';
import { buildRuntime, connectionTest } from './runtime.js';

async function main() {
  const config = loadConfig();
  requireCredentials(config);

  const { client, notifier, monitor } = buildRuntime(config);
  if (!(await connectionTest(config, client, notifier))) {
    throw new Error('connection test failed, check TWELVEDATA_API_KEY');
  }

  monitor.start();
  const server = createApp({ monitor, budget: client.budget }).listen(config.port, () => {
    console.log(`Server on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log('[server] shutting down', { signal });
    server.close();
    monitor.stop().then(
      () => process.exit(0),
      (e: unknown) => {
        console.error('[server] stop failed', errorMessage(e));
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  console.error('[server] fatal', err instanceof Error ? err.message : err);
  process.exit(1);
});
