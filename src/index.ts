import { cfg } from './config.js';
import { createLogger } from './lib/logger.js';
import { createApp } from './server/app.js';

const log = createLogger('server');

// start
createApp().listen(cfg.port, () => {
  log.info(`Server running on :${cfg.port}`);
});
