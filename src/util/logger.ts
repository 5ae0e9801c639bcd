// ============================================================
// Logger
// Namespaced console logging with a global level and an
// optional module allow-list.
// ============================================================

export type LogLevel = 'none' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  level: LogLevel;
  modules?: string[];
  timestamps: boolean;
}

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'warn',
  modules: undefined,
  timestamps: false,
};

let config: LoggerConfig = { ...DEFAULT_CONFIG };

const moduleSet = new Set<string>();

const levelOrder: LogLevel[] = ['none', 'error', 'warn', 'info', 'debug'];

export function configureLogging(opts: Partial<LoggerConfig>): void {
  config = { ...config, ...opts };
  if (opts.modules) {
    moduleSet.clear();
    opts.modules.forEach(m => moduleSet.add(m));
  }
}

export function resetLogging(): void {
  config = { ...DEFAULT_CONFIG };
  moduleSet.clear();
}

export function getLoggingConfig(): Readonly<LoggerConfig> {
  return { ...config };
}

export function shouldLog(level: LogLevel, module?: string): boolean {
  if (level === 'none') return false;
  if (levelOrder.indexOf(level) > levelOrder.indexOf(config.level)) return false;
  if (module && moduleSet.size > 0 && !moduleSet.has(module)) return false;
  return true;
}

function output(level: Exclude<LogLevel, 'none'>, module: string, args: unknown[]): void {
  const stamp = config.timestamps ? `${new Date().toISOString()} ` : '';
  const prefix = `${stamp}[${module}]`;
  switch (level) {
    case 'error':
      console.error(prefix, ...args);
      break;
    case 'warn':
      console.warn(prefix, ...args);
      break;
    case 'info':
      console.info(prefix, ...args);
      break;
    case 'debug':
      console.log(prefix, ...args);
      break;
  }
}

export function createLogger(module: string): Logger {
  return {
    error: (...args) => { if (shouldLog('error', module)) output('error', module, args); },
    warn: (...args) => { if (shouldLog('warn', module)) output('warn', module, args); },
    info: (...args) => { if (shouldLog('info', module)) output('info', module, args); },
    debug: (...args) => { if (shouldLog('debug', module)) output('debug', module, args); },
  };
}
