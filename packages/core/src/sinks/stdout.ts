import type { AuditSink, SinkFilter } from "./types.js";
import { createSinkFilter, toSinkPayload } from "./types.js";
import type { AuditRecord } from "../types.js";

export interface StdoutSinkOptions extends SinkFilter {
  /** Override write function (default: process.stderr). */
  writeFn?: (line: string) => void;
}

/**
 * Emits audit records as JSON lines to stderr (or a custom write function),
 * each tagged with the severity of its kind.
 */
export class StdoutSink implements AuditSink {
  readonly name = "stdout";
  private writeFn: (line: string) => void;
  private accepts: (record: AuditRecord) => boolean;

  constructor(options?: StdoutSinkOptions) {
    this.writeFn = options?.writeFn ?? ((line) => process.stderr.write(line + "\n"));
    this.accepts = createSinkFilter(options ?? {});
  }

  async emit(record: AuditRecord): Promise<void> {
    if (!this.accepts(record)) return;
    this.writeFn(JSON.stringify(toSinkPayload(record)));
  }
}
