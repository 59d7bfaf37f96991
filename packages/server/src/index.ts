import { loadConfig } from './config.js';
import { startServer } from './server.js';

const config = loadConfig();

startServer(config)
  .then((running) => {
    const shutdown = () => {
      console.log('🗼 Shutting down');
      running.close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error('⚠️ Shutdown failed:', err);
          process.exit(1);
        },
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  })
  .catch((err: unknown) => {
    console.error('⚠️ Failed to start:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
