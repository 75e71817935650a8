import {
  type DiagnosticEvent,
  type DiagnosticsSink,
  isLevelEnabled,
  type LogLevel,
} from "@pdftools/utils";

const pad = (n: number) => String(n).padStart(2, "0");

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatEvent(event: DiagnosticEvent, date: Date): string {
  return `${formatTimestamp(date)} [${event.level.toUpperCase()}] ${event.message}`;
}

export function createConsoleSink(
  minimum: LogLevel,
  now: () => Date = () => new Date(),
): DiagnosticsSink {
  return (event) => {
    if (!isLevelEnabled(event.level, minimum)) return;
    const line = formatEvent(event, now());
    if (event.level === "error") {
      console.error(line);
    } else if (event.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };
}
