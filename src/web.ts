import { loadDotEnv, resolveConfig } from './env.js';
import { createWebApp } from './webServer.js';

async function start(): Promise<void> {
  await loadDotEnv();
  const config = resolveConfig();
  const app = createWebApp(config);

  app.listen(config.port, () => {
    console.log(`Part label web service listening on port ${config.port}`);
  });
}

start().catch(error => {
  console.error('[webServer] Failed to start:', error);
  process.exit(1);
});
