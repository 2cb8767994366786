import pino from "pino";

// Set log level via env LOG_LEVEL (default: info), extra file sink via LOG_FILE
const level = process.env.LOG_LEVEL || "info";

function buildTransport(): pino.TransportMultiOptions | undefined {
  const targets: pino.TransportTargetOptions[] = [];
  const env = process.env.NODE_ENV;
  if (env !== "production" && env !== "test") {
    targets.push({ target: "pino-pretty", level, options: { colorize: true } });
  }
  if (process.env.LOG_FILE) {
    if (targets.length === 0) {
      targets.push({ target: "pino/file", level, options: { destination: 1 } });
    }
    targets.push({
      target: "pino/file",
      level,
      options: { destination: process.env.LOG_FILE, mkdir: true },
    });
  }
  return targets.length > 0 ? { targets } : undefined;
}

const transport = buildTransport();
const logger = pino({
  level,
  ...(transport ? { transport } : {}),
});

export interface LogMeta {
  url?: string;
  productName?: string;
  duration?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta = {
      ...meta,
      error: error?.message,
      stack: error?.stack,
    };
    logger.error(errorMeta, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for common logging patterns
  static observationRecorded(
    url: string,
    productName: string,
    price: number,
  ): void {
    this.info(`Price recorded: ${productName}`, { url, productName, price });
  }
  static fetchFailed(url: string, error: Error): void {
    this.error(`Fetch failed: ${url}`, error, { url });
  }
  static cycleComplete(
    cycle: number,
    recorded: number,
    total: number,
    elapsed: string,
  ): void {
    this.info(`Cycle ${cycle} complete: ${recorded}/${total} recorded`, {
      cycle,
      recorded,
      total,
      elapsed,
    });
  }
}
