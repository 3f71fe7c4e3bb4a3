import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { MirrorDb } from './db/sqlite.js';

const config = loadConfig();
const db = new MirrorDb(config.MIRRORS_DB_PATH);
const { app } = await buildApp({ config, db });

app.addHook('onClose', async () => {
  db.close();
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  });
}

await app.listen({ port: config.PORT, host: config.HOST });
