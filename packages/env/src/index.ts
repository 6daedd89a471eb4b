export { getLoggingEnv, getNodeEnv, parseEnv, type LogFormat, type ValidatedEnv } from './config.js';
