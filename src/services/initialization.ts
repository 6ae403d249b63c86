import { getEnvironment, validateEnvironment } from '../config/environment';
import { SEARCH_ENGINES } from '../config/constants';
import { logger } from '../utils/logger';

export class InitializationService {
  async initialize(): Promise<void> {
    try {
      logger.info('Validating environment configuration');
      validateEnvironment();

      const env = getEnvironment();
      logger.info(
        {
          searxngUrl: env.SEARXNG_URL,
          defaultEngine: env.DEFAULT_ENGINE,
          engines: SEARCH_ENGINES.join(', '),
          summarization: env.OPENAI_API_TOKEN ? env.OPENAI_MODEL : 'disabled',
        },
        'Using SearXNG instance'
      );

      logger.info('Application initialized successfully');
    } catch (error) {
      logger.error({ error }, 'Failed to initialize application');
      throw error;
    }
  }
}
