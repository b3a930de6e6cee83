import { EnvConfigProvider } from './config/envProvider.js';
import type { ConfigProvider, LoggerInitOptions } from './types.js';
import { Logger } from './logger.js';

/**
 * Build an isolated (non-singleton) logger instance.
 * Mirrors createLogger() without touching the package singleton.
 */
export async function createInstance(opts: LoggerInitOptions): Promise<Logger> {
  const provider: ConfigProvider = opts.configProvider || new EnvConfigProvider();
  const cfg = opts.initialConfig || await provider.load();
  return new Logger(opts.serviceName, cfg, opts.routerName, opts.instanceId);
}
