export type LogFields = Record<string, unknown>;

export type JsonLogger = {
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
};

/**
 * One JSON object per line. `quiet` silences info events only; warnings are
 * always written.
 */
export const createJsonLogger = (opts: { base?: LogFields; quiet?: boolean } = {}): JsonLogger => {
  const base = opts.base ?? {};

  return {
    info: (event, fields = {}) => {
      if (opts.quiet) return;
      console.log(JSON.stringify({ event, ...base, ...fields }));
    },
    warn: (event, fields = {}) => {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event, ...base, ...fields }));
    }
  };
};
