/**
 * Debug channels, one per conversion stage. `XAMLSHIFT_DEBUG` names the
 * channels to switch on (`parse,write`, or `*` for all); every other channel
 * is a no-op.
 *
 * ```typescript
 * debug.transform("rule.applied", { rule: rule.name, node: element });
 * ```
 */

export const DEBUG_CHANNELS = ["parse", "semantic", "transform", "write", "convert"] as const;

export type DebugChannelName = (typeof DEBUG_CHANNELS)[number];

export type DebugData = Readonly<Record<string, unknown>>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  format: "json" | "pretty";
  output: (message: string) => void;
}

let config: DebugConfig = { format: "pretty", output: (message) => console.log(message) };

function isChannelName(name: string): name is DebugChannelName {
  return DEBUG_CHANNELS.some((channel) => channel === name);
}

function enabledFromEnv(): ReadonlySet<DebugChannelName> {
  const raw = (process.env["XAMLSHIFT_DEBUG"] ?? "").trim().toLowerCase();
  if (raw === "" || raw === "0" || raw === "false") return new Set();
  if (raw === "*" || raw === "1" || raw === "true") return new Set(DEBUG_CHANNELS);
  return new Set(raw.split(",").map((name) => name.trim()).filter(isChannelName));
}

let enabled = enabledFromEnv();

const silent: DebugChannel = () => {};

function channel(name: DebugChannelName): DebugChannel {
  if (!enabled.has(name)) return silent;
  return (point, data) => config.output(format(name, point, data));
}

function format(name: DebugChannelName, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify(data === undefined ? { channel: name, point } : { channel: name, point, data });
  }
  const label = `[${name}.${point}]`;
  const entries = Object.entries(data ?? {});
  if (entries.length === 0) return label;
  return `${label} ${entries.map(([key, value]) => `${key}=${formatValue(value)}`).join(" ")}`;
}

/** Compact rendering; tree nodes print as their type and locations as `line:column`. */
function formatValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value.length > 60 ? `${value.slice(0, 57)}...` : value);
  if (typeof value !== "object" || value === null) return String(value);
  if (Array.isArray(value)) return `[${value.length}]`;
  if ("typeName" in value && typeof value.typeName === "string") return `<${value.typeName}>`;
  if ("line" in value && "column" in value) return `${String(value.line)}:${String(value.column)}`;
  return "{...}";
}

export const debug: Record<DebugChannelName, DebugChannel> = {
  parse: channel("parse"),
  semantic: channel("semantic"),
  transform: channel("transform"),
  write: channel("write"),
  convert: channel("convert"),
};

/** Re-read `XAMLSHIFT_DEBUG`. */
export function refreshDebugChannels(): void {
  enabled = enabledFromEnv();
  for (const name of DEBUG_CHANNELS) debug[name] = channel(name);
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(name?: DebugChannelName): boolean {
  return name === undefined ? enabled.size > 0 : enabled.has(name);
}
