import { loadConfig } from './config/env';
import { createServer } from './server';

async function start() {
  const config = loadConfig();
  const app = createServer({ config });

  app.listen(config.port, config.host, () => {
    console.log(`photomark API running at http://${config.host}:${config.port}`);
  });
}

start().catch((e) => {
  console.error("[start] failed:", e);
  process.exit(1);
});
