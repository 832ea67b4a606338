/* ------------------------------------------------------------------
   Verbosity-gated logger shared by the reader, the writer and the CLI
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = errors only … 4 = trace

export type LogSink = (msg: string) => void;

export interface Logger {
  readonly level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
  /** Same level and sink; messages are tagged `scope: ` */
  child(scope: string): Logger;
}

/**
 * Lines look like `2| reader: Seek to 100 (block 0 + 76)`; the scope part is
 * absent on the root logger.
 */
export function createLogger(
  level: Verbosity = 0,
  sink : LogSink = console.info,
  scope?: string,
): Logger {
  const prefix = scope ? `${scope}: ` : '';
  return {
    level,
    log(lvl, msg) {
      if (lvl <= level) sink(`${lvl}| ${prefix}${msg}`);
    },
    child(sub) {
      return createLogger(level, sink, scope ? `${scope}/${sub}` : sub);
    },
  };
}
