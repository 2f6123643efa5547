/** Least to most verbose. `Silent` writes nothing. */
export enum LogLevel {
  Silent,
  Fatal,
  Error,
  Warn,
  Info,
  Debug,
  Trace,
}

/** The `LogTransport` method a logger writes every record through. */
export enum LogDestination {
  StdOut = 'log',
  StdErr = 'error',
}

/**
 * Step of an auth flow a record was written from. Every AuthRequest log call
 * carries one, so a failed login can be traced to the call that broke.
 */
export type AuthStage =
  | 'authorize'
  | 'requestToken'
  | 'validateState'
  | 'exchangeCode'
  | 'augmentToken'
  | 'fetchProfile'
  | 'refreshToken'
  | 'revokeToken';

/** `build` marks records written while binding a source to its config. */
export type LogStage = AuthStage | 'build';

/**
 * Structured fields merged into a record. Secrets in here are masked by the
 * logger's redaction paths, never by the caller.
 */
export type LogMeta = {
  stage?: LogStage;
  source?: string;
  endpoint?: string;
  [field: string]: unknown;
};

export interface LoggerOptions {
  /** Defaults to `Info` */
  level?: LogLevel;
  /** Dot paths masked in every record, e.g. `token.accessToken` */
  redactPaths?: string[];
  /** Defaults to `StdOut` */
  destination?: LogDestination;
}

/**
 * What AuthRequest and the builder log through. Hosts may pass any
 * implementation, such as an adapter over their own logging library.
 */
export interface Logger {
  /** A logger whose records also carry `context`, e.g. `{ source, clientId }` */
  child(context: LogMeta): Logger;
  level: LogLevel;
  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace(msg: string, meta?: LogMeta): void;
}

/** `console.log` and `console.error` both fit. */
export type LogWriter = (message?: unknown, ...optionalParams: unknown[]) => void;

export interface LogTransport {
  log: LogWriter;
  error: LogWriter;
}
