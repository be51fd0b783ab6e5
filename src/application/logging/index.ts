export { consoleLogger, silentLogger } from './ILogger';
export type { ILogger } from './ILogger';
