// Medical Triage API
// Port: 3737 (localhost only by default)

// Load environment variables from .env file
import 'dotenv/config';

import { env, logConfiguration } from './env.js';
import { buildServer } from './app.js';

const server = await buildServer();

const shutdown = async () => {
  await server.close();
  process.exit(0);
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// Start server
try {
  await server.listen({ port: env.PORT, host: env.HOST });
  console.log(`Triage API listening on http://${env.HOST}:${env.PORT}`);
  console.log(`Health: http://${env.HOST}:${env.PORT}/v1/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
