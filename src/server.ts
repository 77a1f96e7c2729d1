import { createApp } from './app';
import { createPgContainer } from './bootstrap';
import { config, validateConfig } from './config';
import { pool } from './config/database';
import { redis } from './config/redis';
import { maintenanceQueue } from './jobs/queue';
import { scheduleOAuthStateSweep } from './jobs/schedulers/oauth-state.scheduler';

async function startServer(): Promise<void> {
  // Validate environment variables
  const missing = validateConfig();
  if (missing.length > 0) {
    console.error(`❌ Missing required environment variables: ${missing.join(', ')}`);
    process.exit(1);
  }

  try {
    const container = createPgContainer(config, pool, { redis });
    const providers = container.manager.listAvailable().map((provider) => provider.provider_type);
    console.log(`✓ Providers registered: ${providers.length > 0 ? providers.join(', ') : '(none)'}`);

    // Test database connection
    await pool.query('SELECT 1');
    console.log('✓ Database connected');

    // Test Redis connection
    await redis.connect();
    await redis.ping();
    console.log('✓ Redis connected');

    // Initialize scheduled jobs
    await scheduleOAuthStateSweep(maintenanceQueue, container.stateStore);

    const app = createApp(container.appDeps);
    const server = app.listen(config.port, () => {
      console.log('');
      console.log('🚀 Assistme API is live!');
      console.log(`📍 Server running on port ${config.port}`);
      console.log(`🌍 Environment: ${config.nodeEnv}`);
      console.log('');
      console.log('Endpoints:');
      console.log('  GET    /health');
      console.log('  GET    /health/dependencies');
      console.log('  GET    /api/v1/integrations/available');
      console.log('  GET    /api/v1/integrations');
      console.log('  POST   /api/v1/integrations/:provider/connect');
      console.log('  GET    /api/v1/integrations/callback');
      console.log('  GET    /api/v1/integrations/:id/emails');
      console.log('  POST   /api/v1/integrations/:id/execute');
      console.log('  PATCH  /api/v1/integrations/:id');
      console.log('  DELETE /api/v1/integrations/:id');
      console.log('');
    });

    // Graceful shutdown
    process.on('SIGTERM', () => {
      console.log('Shutting down...');
      server.close(() => {
        Promise.all([maintenanceQueue.close(), pool.end(), redis.quit()])
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            console.error('Shutdown failed:', error);
            process.exit(1);
          });
      });
    });
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

void startServer();
