type LogMeta = unknown;

const stamp = () => new Date().toISOString();

export const Logger = {
  info: (msg: string, meta?: LogMeta) => {
    console.log(`[INFO] ${stamp()}: ${msg}`, meta ?? '');
  },
  warn: (msg: string, meta?: LogMeta) => {
    console.warn(`[WARN] ${stamp()}: ${msg}`, meta ?? '');
  },
  error: (msg: string, err?: LogMeta) => {
    console.error(`[ERROR] ${stamp()}: ${msg}`, err ?? '');
  }
};
