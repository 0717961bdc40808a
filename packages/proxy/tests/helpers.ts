import { createLogger, type LogEntry, type LogTransport, type Logger } from "@mqproxy/core";

export class CaptureTransport implements LogTransport {
  readonly name = "capture";
  readonly entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level: LogEntry["level"]): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}

export function silentLogger(): Logger {
  return createLogger({ level: "SILENT", transports: [] });
}

export function captureLogger(): { logger: Logger; transport: CaptureTransport } {
  const transport = new CaptureTransport();
  return { logger: createLogger({ level: "DEBUG", transports: [transport], timestamp: false }), transport };
}

/**
 * Let every queued microtask and the memory broker's deliveries run
 */
export async function flush(): Promise<void> {
  for (let i = 0; i < 3; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export const text = new TextEncoder();
export const utf8 = new TextDecoder();
