import { promises as fs } from "node:fs";
import path from "node:path";

export type OpsEventType = "GPA_RUN_COMPLETED" | "GPA_RUN_FAILED";

type OpsEvent = {
  ts?: string;
  type: OpsEventType;
  route?: string;
  status?: number | null;
  details?: Record<string, unknown>;
};

function resolveLogPath() {
  return process.env.OPS_EVENTS_PATH || path.join(process.cwd(), ".ops-events.jsonl");
}

export function opsEventsEnabled() {
  return process.env.OPS_EVENTS_DISABLED !== "1";
}

export function buildOpsEvent(event: OpsEvent) {
  return {
    ts: event.ts || new Date().toISOString(),
    type: event.type,
    route: event.route || null,
    status: Number.isFinite(Number(event.status)) ? Number(event.status) : null,
    details: event.details || {},
  };
}

export function appendOpsEvent(event: OpsEvent) {
  if (!opsEventsEnabled()) return;
  const payload = buildOpsEvent(event);
  void fs.appendFile(resolveLogPath(), `${JSON.stringify(payload)}\n`, "utf8").catch((e: unknown) => {
    console.warn(
      JSON.stringify({
        level: "warn",
        scope: "ops-events",
        message: `Could not append ops event: ${e instanceof Error ? e.message : String(e)}`,
      })
    );
  });
}
