import { serve } from '@hono/node-server';
import { createApp } from './index';
import { loadConfig } from './services/config';
import { configureLogging, createLogger } from './services/logger';
import { createPaperSearch } from './services/paper-search';

const config = loadConfig();
configureLogging(config.logging);

const log = createLogger('Server');
const port = config.server.port;

const app = createApp({
  search: createPaperSearch(config),
  allowedOrigins: config.server.allowedOrigins,
});

log.info(`Starting server on port ${port}...`);

serve({ fetch: app.fetch, port }, (info) => {
  log.info(`Server running at http://localhost:${info.port}`);
});
