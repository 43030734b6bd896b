export { parseEnv, createConfig, EnvSchema, type Env, type AppConfig } from './env.js';
