import { valueGeneratorForProvider } from '@formprobe/ai';
import { createEngine, createLogger, loadEngineConfigFromFile } from '@formprobe/core';

import { createApp } from './app.js';

const config = loadEngineConfigFromFile(process.env.ENV_FILE);
const logger = createLogger('server', config.logLevel);
const engine = createEngine(config, {
  logger,
  generator: valueGeneratorForProvider(config.aiProvider, process.env, config.aiTimeoutMs)
});

createApp(engine, { artifactsRoot: config.artifactsRoot, logger }).listen(config.port, () => {
  logger.info(`formprobe server listening on http://localhost:${config.port}`);
});
