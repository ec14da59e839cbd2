import 'dotenv/config';
import { getConfig } from './config.js';
import { buildServer } from './server.js';

async function start() {
  const config = getConfig();
  const { port, host, nodeEnv } = config.server;

  console.log('=== Visitor Kiosk API Starting ===');
  console.log(`PORT=${port}, HOST=${host}`);
  console.log(`NODE_ENV=${nodeEnv}`);
  console.log(`STORE_ADAPTER=${config.database.adapter}`);

  try {
    const app = await buildServer({ config });

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        app.log.info(`${signal} received, shutting down`);
        app.close().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error(err);
            process.exit(1);
          },
        );
      });
    }

    await app.listen({ port, host });
    app.log.info(`Visitor Kiosk API running on ${host}:${port}`);
  } catch (err) {
    console.error('=== STARTUP FAILED ===');
    console.error(err);
    process.exit(1);
  }
}

await start();
