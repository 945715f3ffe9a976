export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export type LogRecord = LogContext & {
  level: LogLevel;
  service: string;
  msg: string;
  ts: string;
};

export type LogSink = (record: LogRecord) => void;

export type LoggerFn = (msg: string, context?: LogContext) => void;

export type Logger = {
  debug: LoggerFn;
  info: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
  child: (context: LogContext) => Logger;
};

export type LoggerOptions = {
  service: string;
  now?: () => string;
  sink?: LogSink;
  context?: LogContext;
};

export const stdoutSink: LogSink = (record) => {
  console.log(JSON.stringify(record));
};

export const stderrSink: LogSink = (record) => {
  console.error(JSON.stringify(record));
};

export const silentSink: LogSink = () => {};

export const errorMessage = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};

export const createLogger = ({
  service,
  now = () => new Date().toISOString(),
  sink = stdoutSink,
  context: bound = {}
}: LoggerOptions): Logger => {
  const write = (level: LogLevel, msg: string, context?: LogContext) => {
    const record: LogRecord = {
      ...bound,
      ...(context ?? {}),
      level,
      service,
      msg,
      ts: now()
    };

    sink(record);
  };

  return {
    debug: (msg, context) => write("debug", msg, context),
    info: (msg, context) => write("info", msg, context),
    warn: (msg, context) => write("warn", msg, context),
    error: (msg, context) => write("error", msg, context),
    child: (context) =>
      createLogger({ service, now, sink, context: { ...bound, ...context } })
  };
};
