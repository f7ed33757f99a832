import { createApp } from './app.js';
import { loadServerConfig } from './config.js';
import { SignalGenerator } from './services/signal-generator.js';
import { consoleLogger } from './utils/logger.js';

const { host, port } = loadServerConfig();

const generator = new SignalGenerator({ logger: consoleLogger });
const app = createApp({ generator, logger: consoleLogger });

app.listen(port, host, () => {
  consoleLogger.info(`Signal simulator listening on ${host}:${port}`);
});
