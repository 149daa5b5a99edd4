// apps/http/src/index.ts
import dotenv from 'dotenv';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';

async function main() {
  dotenv.config();
  const cfg = loadConfig();
  const app = await buildApp(cfg);

  app.log.info(
    {
      maxRows: cfg.maxRows,
      maxSteps: cfg.maxSteps,
      cors: cfg.corsOrigins.length ? cfg.corsOrigins : 'any',
      rateLimitMax: cfg.rateLimitMax
    },
    'transform-config'
  );

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await app.close();
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: cfg.port, host: cfg.host });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});
