/** Pipeline stages that write to the log */
export type Component = "HISTORY" | "LLM" | "ANALYZE" | "INGEST" | "OBSERVE" | "CLI";

export type Logger = {
  info: (msg: string, ...details: unknown[]) => void;
  warn: (msg: string, ...details: unknown[]) => void;
  error: (msg: string, ...details: unknown[]) => void;
};

const stamp = () => new Date().toISOString();

/** Console logger bound to one stage: `<iso> [WARN] [HISTORY] message ...details` */
export function logger(component: Component): Logger {
  const tag = `[${component}]`;
  return {
    info: (msg, ...d) => console.log(stamp(), "[INFO]", tag, msg, ...d),
    warn: (msg, ...d) => console.warn(stamp(), "[WARN]", tag, msg, ...d),
    error: (msg, ...d) => console.error(stamp(), "[ERROR]", tag, msg, ...d),
  };
}
