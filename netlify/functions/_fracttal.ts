import { loadConfig, type AppConfig } from '../../src/config';
import { FracttalClient } from '../../src/services/fracttalClient';

let config: AppConfig | null = null;

// Read on first use so a missing key fails the request, not the function bundle.
export function getConfig(): AppConfig {
  if (!config) {
    config = loadConfig(process.env);
  }
  return config;
}

export function createFracttalClient(config: AppConfig = getConfig()): FracttalClient {
  return new FracttalClient(config.fracttal);
}
