/**
 * Configurable Logger - Zero dependencies
 * Supports log streaming to subscribers (tests and live monitoring)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text' | 'pretty';

// ═══════════════════════════════════════════════════════════════════
// Log Entry Type (for streaming)
// ═══════════════════════════════════════════════════════════════════

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  data?: Record<string, unknown>;
}

export type LogSubscriber = (entry: LogEntry) => void;

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════

export interface LoggerConfig {
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Output format (default: 'json') */
  format?: LogFormat;
  /** Include timestamp (default: true) */
  timestamp?: boolean;
  /** Service name to include in logs */
  service?: string;
  /** Custom metadata to include in every log */
  metadata?: Record<string, unknown>;
  /** Write formatted lines to stdout/stderr (default: true) */
  output?: boolean;
}

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

type ResolvedLoggerConfig = Required<Omit<LoggerConfig, 'metadata'>> & { metadata?: Record<string, unknown> };

let config: ResolvedLoggerConfig = {
  level: 'info',
  format: 'json',
  timestamp: true,
  service: 'authz-service',
  output: true,
};

// ═══════════════════════════════════════════════════════════════════
// Log Subscribers (for streaming)
// ═══════════════════════════════════════════════════════════════════

const subscribers = new Set<LogSubscriber>();

export function subscribeToLogs(subscriber: LogSubscriber): () => void {
  subscribers.add(subscriber);
  return () => {
    subscribers.delete(subscriber);
  };
}

function notifySubscribers(level: LogLevel, service: string, message: string, data?: Record<string, unknown>): void {
  if (subscribers.size === 0) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    service,
    message,
    ...(data && { data }),
  };

  for (const subscriber of subscribers) {
    try {
      subscriber(entry);
    } catch {
      // ignore subscriber errors
    }
  }
}

// ═══════════════════════════════════════════════════════════════════
// Formatters
// ═══════════════════════════════════════════════════════════════════

const colors = {
  reset: '\x1b[0m',
  debug: '\x1b[36m',  // cyan
  info: '\x1b[32m',   // green
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

type Formatter = (level: LogLevel, service: string, message: string, data?: Record<string, unknown>) => string;

const formatJson: Formatter = (level, service, message, data) =>
  JSON.stringify({
    ...(config.timestamp && { timestamp: new Date().toISOString() }),
    level,
    ...(service && { service }),
    message,
    ...config.metadata,
    ...data,
  });

const formatText: Formatter = (level, service, message, data) => {
  const parts: string[] = [];
  if (config.timestamp) parts.push(new Date().toISOString());
  parts.push(`[${level.toUpperCase()}]`);
  if (service) parts.push(`[${service}]`);
  parts.push(message);
  if (data && Object.keys(data).length > 0) {
    parts.push(JSON.stringify(data));
  }
  return parts.join(' ');
};

const formatPretty: Formatter = (level, service, message, data) => {
  const color = colors[level];
  const parts: string[] = [];
  if (config.timestamp) parts.push(`\x1b[90m${new Date().toISOString()}\x1b[0m`);
  parts.push(`${color}${level.toUpperCase().padEnd(5)}${colors.reset}`);
  if (service) parts.push(`\x1b[90m[${service}]\x1b[0m`);
  parts.push(message);
  if (data && Object.keys(data).length > 0) {
    parts.push(`\x1b[90m${JSON.stringify(data)}\x1b[0m`);
  }
  return parts.join(' ');
};

const formatters: Record<LogFormat, Formatter> = {
  json: formatJson,
  text: formatText,
  pretty: formatPretty,
};

// ═══════════════════════════════════════════════════════════════════
// Core Logger
// ═══════════════════════════════════════════════════════════════════

function log(level: LogLevel, service: string, message: string, data?: Record<string, unknown>): void {
  if (levels[level] < levels[config.level]) return;

  if (config.output) {
    const formatted = formatters[config.format](level, service, message, data);
    (level === 'error' ? process.stderr : process.stdout).write(formatted + '\n');
  }

  notifySubscribers(level, service, message, data);
}

export const logger = {
  debug: (msg: string, data?: Record<string, unknown>) => log('debug', config.service, msg, data),
  info: (msg: string, data?: Record<string, unknown>) => log('info', config.service, msg, data),
  warn: (msg: string, data?: Record<string, unknown>) => log('warn', config.service, msg, data),
  error: (msg: string, data?: Record<string, unknown>) => log('error', config.service, msg, data),

  /** Configure logger settings */
  configure: (cfg: LoggerConfig) => {
    config = { ...config, ...cfg };
  },

  /** Get current configuration */
  getConfig: (): ResolvedLoggerConfig => ({ ...config }),
} satisfies Logger & { configure(cfg: LoggerConfig): void; getConfig(): ResolvedLoggerConfig };

// ═══════════════════════════════════════════════════════════════════
// Convenience Functions
// ═══════════════════════════════════════════════════════════════════

export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

export function configureLogger(cfg: LoggerConfig): void {
  logger.configure(cfg);
}

// ═══════════════════════════════════════════════════════════════════
// Child Logger (for creating scoped loggers)
// ═══════════════════════════════════════════════════════════════════

/**
 * Scoped logger. The service name is resolved per call, so a child created
 * at module load still follows a later `configureLogger({ service })`.
 */
export function createChildLogger(childConfig: { service?: string; metadata?: Record<string, unknown> }): Logger {
  const childMeta = childConfig.metadata ?? {};
  const service = (): string => childConfig.service ?? config.service;

  return {
    debug: (msg, data) => log('debug', service(), msg, { ...childMeta, ...data }),
    info: (msg, data) => log('info', service(), msg, { ...childMeta, ...data }),
    warn: (msg, data) => log('warn', service(), msg, { ...childMeta, ...data }),
    error: (msg, data) => log('error', service(), msg, { ...childMeta, ...data }),
  };
}
