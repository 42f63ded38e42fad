export { loadEnv, parseEnv, resetEnvCache, type EnvConfig } from './config.js';
