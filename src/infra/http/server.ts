import { loadConfig } from '../config.js';
import { pingDatabase } from '../db/pool.js';
import { PgUserRepo } from '../db/userRepo.js';
import { PgPostRepo } from '../db/postRepo.js';
import { StaticDataService } from '../../application/catalog/staticDataService.js';
import { createApp } from './app.js';

const config = loadConfig();

if (!config.jwtSecret) {
  throw new Error('JWT_SECRET environment variable is required');
}

const app = createApp({
  settings: { ...config, jwtSecret: config.jwtSecret },
  userRepo: new PgUserRepo(),
  postRepo: new PgPostRepo(),
  catalog: new StaticDataService(),
  healthCheck: pingDatabase,
});

app.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port}`);
  console.log(`API docs: http://localhost:${config.port}/docs`);
  console.log(`Health check: http://localhost:${config.port}/healthz`);
});

export default app;
