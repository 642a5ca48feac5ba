import { createServer } from 'http';
import { log, logger } from './utils/logger';
import { createApp } from './app';
import { config } from '../../shared/config';
import { ConfigurationError } from '../../shared/errors/ErrorClassifier';
import { AlchemyClient } from './services/alchemyClient';
import { SnapshotCache } from './services/snapshotCache';
import { WhaleService } from './services/whaleService';
import { AnalystService, OpenAIChatClient } from './services/analystService';

const bootstrap = () => {
  // 缺少 ALCHEMY_API_KEY 時在此拋出 ConfigurationError
  const provider = new AlchemyClient({
    apiKey: config.provider.apiKey,
    network: config.provider.network,
    timeoutMs: config.provider.timeoutMs,
    maxCount: config.provider.maxCount,
  });

  const cache = new SnapshotCache({ ttlMs: config.whales.cacheTtlMs });
  const whales = new WhaleService({ provider, cache, maxLimit: config.whales.maxLimit });

  let analyst: AnalystService | null = null;
  if (config.llm.apiKey) {
    analyst = new AnalystService(new OpenAIChatClient({
      apiKey: config.llm.apiKey,
      baseUrl: config.llm.baseUrl,
      model: config.llm.model,
      timeoutMs: config.llm.timeoutMs,
    }));
  } else {
    log.warn('OPENAI_API_KEY not set, summary and chat endpoints are disabled');
  }

  return createApp({ whales, analyst, maxLimit: config.whales.maxLimit });
};

try {
  const app = bootstrap();
  const httpServer = createServer(app);
  const PORT = config.server.port;

  httpServer.listen(PORT, () => {
    log.info(`API Server running on port ${PORT}`);
    log.info(`Environment: ${config.server.env}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    log.info(`${signal} signal received: closing HTTP server`);
    httpServer.close(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
} catch (error) {
  if (error instanceof ConfigurationError) {
    logger.error(`Configuration error: ${error.message}`, { type: error.errorType, setting: error.setting });
  } else {
    log.error('Failed to start API Server', error);
  }
  process.exit(1);
}
