import fs from "node:fs";
import path from "node:path";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  payload?: JsonObject;
};

// Appends one JSON document per line; base fields are merged into every event.
export class JsonlLogger {
  readonly filePath: string;
  private readonly base: JsonObject;

  constructor(filePath: string, base: JsonObject = {}) {
    this.filePath = path.resolve(filePath);
    this.base = base;
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
  }

  log(event: LogEvent): void {
    const line: JsonObject = {
      ts: new Date().toISOString(),
      ...this.base,
      type: event.type,
    };
    if (event.payload) {
      line.payload = event.payload;
    }

    fs.appendFileSync(this.filePath, `${JSON.stringify(line)}\n`, "utf8");
  }
}

export function logQueryEvent(logger: JsonlLogger, type: string, payload?: JsonObject): void {
  logger.log({ type, payload });
}
