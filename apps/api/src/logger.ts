type Level = "info" | "error";

export type DraftContext = {
  draft_id?: string;
};

export type LogEntry = {
  level: Level;
  msg: string;
  [key: string]: unknown;
};

type LogLevelSetting = "silent" | "error" | "info";

export function isTestRuntime(): boolean {
  // Vitest sets NODE_ENV="test" in many setups, but don't rely on it.
  return (
    process.env.NODE_ENV === "test" ||
    process.env.VITEST === "true" ||
    typeof process.env.VITEST_WORKER_ID === "string"
  );
}

function getConfiguredLevel(): LogLevelSetting {
  const raw = String(process.env.LOG_LEVEL || "").toLowerCase();
  if (raw === "silent" || raw === "error" || raw === "info") return raw;
  if (isTestRuntime()) return "silent";
  return "info";
}

function shouldLog(entryLevel: Level): boolean {
  const configured = getConfiguredLevel();
  if (configured === "silent") return false;
  if (configured === "error") return entryLevel === "error";
  return true;
}

function wantsPrettyOutput(): boolean {
  const raw = String(process.env.LOG_FORMAT || "").toLowerCase();
  if (raw === "json") return false;
  if (raw === "pretty") return true;
  return isTestRuntime();
}

function formatKeyValue(key: string, value: unknown): string {
  if (value === undefined) return "";
  if (value === null) return `${key}=null`;
  if (typeof value === "string") return `${key}="${value}"`;
  if (typeof value === "number" || typeof value === "boolean") return `${key}=${value}`;
  try {
    return `${key}=${JSON.stringify(value)}`;
  } catch {
    return `${key}=[unserializable]`;
  }
}

export function toPrettyLine(entry: LogEntry): string {
  const { level, msg, ...rest } = entry;

  if (msg === "request") {
    const method = rest.method ? String(rest.method) : "?";
    const p = rest.path ? String(rest.path) : "?";
    const status = rest.status ? String(rest.status) : "?";
    const duration =
      typeof rest.duration_ms === "number" ? `${rest.duration_ms}ms` : "?ms";
    const extras = rest.draft_id !== undefined ? ` ${formatKeyValue("draft_id", rest.draft_id)}` : "";
    return `${level.toUpperCase()} ${method} ${p} -> ${status} (${duration})${extras}`;
  }

  if (msg === "draft_pick" || msg === "draft_undo") {
    const round = rest.round_number ?? "?";
    const pick = rest.pick_number ?? "?";
    const team = rest.team_index ?? "?";
    const player = rest.player_id ? String(rest.player_id) : String(rest.position ?? "?");
    return `${level.toUpperCase()} ${msg} draft=${String(rest.draft_id ?? "?")} R${String(round)}P${String(pick)} team=${String(team)} player=${player}`;
  }

  const extras = Object.keys(rest)
    .sort()
    .map((k) => formatKeyValue(k, rest[k]))
    .filter(Boolean)
    .join(" ");
  return `${level.toUpperCase()} ${msg}${extras ? ` ${extras}` : ""}`;
}

export function log(entry: LogEntry) {
  if (!shouldLog(entry.level)) return;
  console.log(wantsPrettyOutput() ? toPrettyLine(entry) : JSON.stringify(entry));
}

export function deriveDraftContext(path: string): DraftContext {
  const match = /^\/drafts\/([^/?]+)/.exec(path);
  return match ? { draft_id: decodeURIComponent(match[1]) } : {};
}

export function buildRequestLog(input: {
  method: string;
  path: string;
  status: number;
  duration_ms: number;
}): LogEntry {
  return {
    level: "info",
    msg: "request",
    method: input.method,
    path: input.path,
    status: input.status,
    duration_ms: input.duration_ms,
    ...deriveDraftContext(input.path)
  };
}

export function buildPickLog(input: {
  msg: "draft_pick" | "draft_undo";
  draft_id: string;
  round_number: number;
  pick_number: number;
  team_index: number;
  player: { id?: string; position: string };
}): LogEntry {
  return {
    level: "info",
    msg: input.msg,
    draft_id: input.draft_id,
    round_number: input.round_number,
    pick_number: input.pick_number,
    team_index: input.team_index,
    position: input.player.position,
    ...(input.player.id !== undefined ? { player_id: input.player.id } : {})
  };
}
