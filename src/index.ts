import http from 'http';
import { config } from './config';
import { logger } from './utils/logger';
import { createApp } from './app';

const app = createApp();
const server = http.createServer(app);

server.listen(config.port, config.host, () => {
  logger.info(
    { port: config.port, host: config.host, variant: config.defaultVariant, scratchDir: config.scratchDir },
    'print-dispatch server started'
  );
});

export { app, server };
