import type { AuditSeverity, AuditSink, SinkConfig } from "./types.js";
import { AUDIT_SEVERITIES } from "./types.js";
import { AUDIT_KINDS } from "../types.js";
import type { AuditKind } from "../types.js";
import { StdoutSink } from "./stdout.js";
import { WebhookSink } from "./webhook.js";

function isAuditKind(value: unknown): value is AuditKind {
  return AUDIT_KINDS.some((kind) => kind === value);
}

function validateEvents(events: unknown): AuditKind[] | undefined {
  if (!events) return undefined;
  if (!Array.isArray(events)) {
    throw new Error(`Sink 'events' must be an array, got: ${typeof events}`);
  }
  const invalid = events.filter((e) => !isAuditKind(e));
  if (invalid.length > 0) {
    throw new Error(
      `Sink has invalid events: ${invalid.join(", ")}. Must be one of ${AUDIT_KINDS.join(", ")}.`
    );
  }
  return events.filter(isAuditKind);
}

function validateSeverity(value: unknown): AuditSeverity | undefined {
  if (value === undefined) return undefined;
  const severity = AUDIT_SEVERITIES.find((s) => s === value);
  if (!severity) {
    throw new Error(`Sink 'min_severity' must be one of ${AUDIT_SEVERITIES.join(", ")}, got: ${String(value)}`);
  }
  return severity;
}

function validateRetries(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new Error(`WebhookSink 'retries' must be a non-negative integer, got: ${String(value)}`);
  }
  return value;
}

function validateHeaders(headers: unknown): Record<string, string> | undefined {
  if (headers === undefined) return undefined;
  if (typeof headers !== "object" || headers === null || Array.isArray(headers)) {
    throw new Error("WebhookSink 'headers' must be a mapping");
  }
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    result[key] = String(value);
  }
  return result;
}

/**
 * Create sink instances from the `sinks:` section of a policy file.
 */
export function createSinks(configs: SinkConfig[]): AuditSink[] {
  return configs.map((config) => {
    const events = validateEvents(config.events);
    const minSeverity = validateSeverity(config.min_severity);

    switch (config.type) {
      case "stdout":
        return new StdoutSink({ events, minSeverity });

      case "webhook": {
        if (!config.url || typeof config.url !== "string") {
          throw new Error(
            `WebhookSink requires a 'url' string, got: ${typeof config.url}`
          );
        }
        return new WebhookSink({
          url: config.url,
          headers: validateHeaders(config.headers),
          retries: validateRetries(config.retries),
          events,
          minSeverity,
        });
      }

      default:
        throw new Error(`Unknown sink type: ${config.type}`);
    }
  });
}
