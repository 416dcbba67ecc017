import { loadConfig, type AppConfig } from '../../src/config/app-config';

export const TEST_ENV: NodeJS.ProcessEnv = {
  POSTGRES_HOST: 'db.test',
  POSTGRES_PORT: '5433',
  POSTGRES_DB: 'contracts',
  POSTGRES_USER: 'tester',
  POSTGRES_PASSWORD: 'test-password',
  LOG_LEVEL: 'error',
  LLM_TIMEOUT_MS: '200',
};

export function testConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ ...TEST_ENV, ...overrides });
}
