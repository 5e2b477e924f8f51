export type { AuditSink, AuditSeverity, SinkConfig, SinkFilter, SinkPayload } from "./types.js";
export { SEVERITY_BY_KIND, AUDIT_SEVERITIES, toSinkPayload } from "./types.js";
export { StdoutSink } from "./stdout.js";
export { WebhookSink } from "./webhook.js";
export { createSinks } from "./factory.js";
