import { loadEnvironmentConfig } from "./config/environment";
import { createApp } from "./app";
import { log } from "./utils/log";

try {
  log('🔍 Validating environment configuration...');
  const config = loadEnvironmentConfig();

  const app = createApp(config);

  log(`🚀 Starting server on port ${config.PORT}...`);
  const server = app.listen(config.PORT, "0.0.0.0", () => {
    log(`✅ Server successfully started on port ${config.PORT}`);
  });

  server.on('error', (error: Error) => {
    log(`❌ Server error: ${error.message}`);
    console.error('Server failed to start:', error);
    process.exit(1);
  });
} catch (error) {
  log(`❌ Server initialization failed: ${error instanceof Error ? error.message : String(error)}`);
  console.error('Critical server initialization error:', error);
  process.exit(1);
}
