export type LoggerLike = {
  info: (obj: unknown, msg?: string) => void;
  debug: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
};

function two(n: number): string {
  return String(n).padStart(2, "0");
}

function formatTimestamp(d: Date): string {
  // Local time, human readable: YYYY-MM-DD HH:mm:ss
  return `${d.getFullYear()}-${two(d.getMonth() + 1)}-${two(d.getDate())} ${two(
    d.getHours(),
  )}:${two(d.getMinutes())}:${two(d.getSeconds())}`;
}

const consoleLogger: LoggerLike = {
	info: (obj: unknown, msg?: string) =>
		console.log(`[${formatTimestamp(new Date())}] ${msg ?? ""}`.trim(), obj),
	debug: (obj: unknown, msg?: string) =>
		console.debug(`[${formatTimestamp(new Date())}] ${msg ?? ""}`.trim(), obj),
	warn: (obj: unknown, msg?: string) =>
		console.warn(`[${formatTimestamp(new Date())}] ${msg ?? ""}`.trim(), obj),
	error: (obj: unknown, msg?: string) =>
		console.error(`[${formatTimestamp(new Date())}] ${msg ?? ""}`.trim(), obj),
};

export function safePreview(input: string, maxLen = 120): string {
  const oneLine = input.replace(/\s+/g, " ").trim();
  if (oneLine.length <= maxLen) return oneLine;
  return `${oneLine.slice(0, maxLen)}…`;
}

export function ensureLogger(log?: LoggerLike): LoggerLike {
	return log ?? consoleLogger;
}
