import { createServer } from 'http';
import { createApp } from './app.js';
import { loadConfig, loadEnvFile } from './config/index.js';
import { createPasswordVerifier } from './services/passwordVerifier.js';
import { openStore } from './store/index.js';

const startServer = async () => {
  loadEnvFile();
  const config = loadConfig();
  const { store, close } = await openStore(config);

  const app = createApp(config, {
    store,
    passwordVerifier: createPasswordVerifier(config.passwordScheme),
  });
  const httpServer = createServer(app);

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`🛑 ${signal} received, shutting down`);

    httpServer.close(() => {
      close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('❌ Failed to release the store:', error);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  httpServer.listen(config.port, '0.0.0.0', () => {
    console.log(`🚀 Server running on port ${config.port}`);
    console.log(`📊 Environment: ${config.nodeEnv}`);
    console.log(`🗄️ Store: ${config.storeDriver}`);
    console.log(`🔑 Password scheme: ${config.passwordScheme}`);
    console.log(`📱 App version: ${config.appVersion} (minimum ${config.minAppVersion})`);
  });
};

startServer().catch((error: unknown) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
